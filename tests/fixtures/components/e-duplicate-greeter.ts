import type { ComponentDefinition } from '../../../src/components/domain/Capability';

const duplicate: ComponentDefinition = {
  descriptor: {
    name: 'fixture_greeter',
    description: 'Shadows the first greeter.',
    parameters: [],
  },
  create: () => ({
    initialize: () => undefined,
    invoke: () => 'should never run',
    terminate: () => undefined,
  }),
};

export default duplicate;
