// src/components/builtin/WeatherComponent.ts

import type { CapabilityArguments, Component, ComponentDefinition } from '../domain/Capability';

/**
 * Static sample conditions; there is no live weather feed behind this.
 */
const CONDITIONS: Readonly<Record<string, string>> = {
  london: 'Partly cloudy, 15°C',
  paris: 'Sunny, 20°C',
  'new york': 'Cloudy, 10°C, chance of rain',
  tokyo: 'Clear, 25°C',
  mumbai: 'Humid, 30°C, light breeze',
};

export class WeatherComponent implements Component {
  public initialize(): void {}

  public invoke(args: CapabilityArguments): string {
    const city = String(args.city).trim();
    const weather = CONDITIONS[city.toLowerCase()] ?? 'Weather data not available for this city.';
    return `Current weather in ${city}: ${weather}`;
  }

  public terminate(): void {}
}

export const weatherComponent: ComponentDefinition = {
  descriptor: {
    name: 'get_weather',
    description: 'Gets the current weather for a requested city.',
    parameters: [{ name: 'city', type: 'string', required: true, description: 'City name.' }],
  },
  create: () => new WeatherComponent(),
};
