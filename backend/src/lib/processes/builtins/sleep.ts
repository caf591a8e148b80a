import { setTimeout as delay } from 'node:timers/promises';
import type { ProcessDefinition } from '../types.js';

export const MAX_SLEEP_MS = 10 * 60 * 1000;
const STEPS = 10;

export const sleepProcess: ProcessDefinition = {
  id: 'sleep',
  title: 'Sleep',
  description: 'Waits for the given number of milliseconds. Stops early when the job is dismissed.',
  version: '1.0.0',
  keywords: ['test'],
  jobControlOptions: ['async-execute', 'dismiss'],
  outputTransmission: ['value'],
  inputs: {
    duration: {
      title: 'Duration (ms)',
      schema: { type: 'integer', minimum: 0, maximum: MAX_SLEEP_MS },
    },
  },
  outputs: {
    slept: {
      title: 'Milliseconds slept',
      schema: { type: 'integer' },
    },
  },
  execute: async (inputs, ctx) => {
    const duration = inputs.duration;
    if (typeof duration !== 'number' || duration < 0 || duration > MAX_SLEEP_MS) {
      throw new Error(`duration must be between 0 and ${MAX_SLEEP_MS}`);
    }
    const step = duration / STEPS;
    for (let i = 1; i <= STEPS; i += 1) {
      await delay(step, undefined, { signal: ctx.signal });
      await ctx.reportProgress((i / STEPS) * 100);
    }
    return { slept: duration };
  },
};
