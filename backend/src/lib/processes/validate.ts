import type { Execute, InputDescription, JsonSchema } from '@geoapi/shared';
import { isRecord } from '../db/json.js';
import { ValidationError } from '../http/errors.js';
import type { ProcessDescription } from './types.js';

/**
 * Checks the shape of an execute request body. Input values stay opaque here;
 * `validateInputs` compares them to a process description.
 */
export function parseExecuteRequest(body: unknown): Execute {
  if (body === undefined || body === null) return {};
  if (!isRecord(body)) {
    throw new ValidationError('Execute request must be a JSON object');
  }

  const execute: Execute = {};
  if (body.inputs !== undefined) {
    if (!isRecord(body.inputs)) throw new ValidationError('inputs must be an object');
    execute.inputs = body.inputs;
  }
  if (body.outputs !== undefined) {
    if (!isRecord(body.outputs)) throw new ValidationError('outputs must be an object');
    execute.outputs = body.outputs;
  }
  if (body.response !== undefined) {
    if (body.response !== 'raw' && body.response !== 'document') {
      throw new ValidationError('response must be "raw" or "document"');
    }
    execute.response = body.response;
  }
  if (body.subscriber !== undefined) {
    const subscriber = body.subscriber;
    if (!isRecord(subscriber)) throw new ValidationError('subscriber must be an object');
    const uris: NonNullable<Execute['subscriber']> = {};
    for (const key of ['successUri', 'inProgressUri', 'failedUri'] as const) {
      const value = subscriber[key];
      if (value === undefined) continue;
      if (typeof value !== 'string') throw new ValidationError(`subscriber.${key} must be a string`);
      uris[key] = value;
    }
    execute.subscriber = uris;
  }
  return execute;
}

function matchesType(value: unknown, schema: JsonSchema): boolean {
  switch (schema.type) {
    case undefined:
      return true;
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return isRecord(value);
    case 'array':
      return Array.isArray(value);
    case 'null':
      return value === null;
  }
}

function checkOccurrences(name: string, input: InputDescription, value: unknown) {
  const max = input.maxOccurs ?? 1;
  const repeated = max === 'unbounded' || max > 1;
  const values = repeated && Array.isArray(value) && input.schema.type !== 'array' ? value : [value];

  const min = input.minOccurs ?? 1;
  if (values.length < min) {
    throw new ValidationError(`Input "${name}" needs at least ${min} value(s)`);
  }
  if (max !== 'unbounded' && values.length > max) {
    throw new ValidationError(`Input "${name}" accepts at most ${max} value(s)`);
  }
  for (const entry of values) {
    if (!matchesType(entry, input.schema)) {
      throw new ValidationError(`Input "${name}" must be of type ${input.schema.type}`);
    }
  }
}

export function validateInputs(process: ProcessDescription, inputs: Record<string, unknown>): void {
  for (const name of Object.keys(inputs)) {
    if (!Object.prototype.hasOwnProperty.call(process.inputs, name)) {
      throw new ValidationError(`Unknown input "${name}" for process "${process.id}"`);
    }
  }
  for (const [name, input] of Object.entries(process.inputs)) {
    const value = inputs[name];
    if (value === undefined) {
      if ((input.minOccurs ?? 1) > 0) {
        throw new ValidationError(`Missing required input "${name}"`);
      }
      continue;
    }
    checkOccurrences(name, input, value);
  }
}
