import type { ComponentDefinition } from '../../../src/components/domain/Capability';

export const component: ComponentDefinition = {
  descriptor: {
    name: 'fixture_counter',
    description: 'Counts invocations.',
    parameters: [],
  },
  create: () => {
    let count = 0;
    return {
      initialize: () => {
        count = 0;
      },
      invoke: () => {
        count += 1;
        return count;
      },
      terminate: () => undefined,
    };
  },
};
