import type { ProcessDefinition } from '../types.js';

export const echoProcess: ProcessDefinition = {
  id: 'echo',
  title: 'Echo',
  description: 'Returns its inputs unchanged.',
  version: '1.0.0',
  keywords: ['test'],
  jobControlOptions: ['async-execute', 'sync-execute', 'dismiss'],
  outputTransmission: ['value'],
  inputs: {
    value: {
      title: 'Value',
      description: 'Any JSON value.',
      schema: {},
      minOccurs: 0,
    },
  },
  outputs: {
    value: {
      title: 'Value',
      schema: {},
    },
  },
  execute: async inputs => ({ ...inputs }),
};
