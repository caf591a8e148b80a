import { describe, test } from 'node:test';
import assert from 'node:assert';
import '../../../__tests__/support.js';
import { openDatabase } from '../../db/client.js';
import { NotFoundError, ValidationError } from '../../http/errors.js';
import { boundingBox } from '../builtins/bbox.js';
import { builtinProcesses } from '../builtins/index.js';
import { echoProcess } from '../builtins/echo.js';
import { sleepProcess } from '../builtins/sleep.js';
import { ProcessRegistry } from '../registry.js';
import type { ProcessDescription } from '../types.js';
import { parseExecuteRequest, validateInputs } from '../validate.js';

describe('ProcessRegistry', () => {
  test('lists seeded processes by id with a total', async () => {
    const registry = new ProcessRegistry(openDatabase(':memory:'), builtinProcesses);
    assert.strictEqual(registry.seed(), 3);

    const all = await registry.list({ limit: 10, offset: 0 });
    assert.deepStrictEqual(all.processes.map(p => p.id), ['bbox', 'echo', 'sleep']);
    assert.strictEqual(all.total, 3);

    const page = await registry.list({ limit: 1, offset: 1 });
    assert.deepStrictEqual(page.processes.map(p => p.id), ['echo']);
  });

  test('describes a process from its stored row', async () => {
    const registry = new ProcessRegistry(openDatabase(':memory:'), [sleepProcess]);
    registry.seed();
    const described = await registry.get('sleep');
    assert.deepStrictEqual(described.jobControlOptions, ['async-execute', 'dismiss']);
    assert.deepStrictEqual(described.inputs.duration.schema, { type: 'integer', minimum: 0, maximum: 600000 });
    assert.strictEqual(described.version, '1.0.0');
    assert.strictEqual('execute' in described, false);
  });

  test('unknown ids are NotFound', async () => {
    const registry = new ProcessRegistry(openDatabase(':memory:'), []);
    await assert.rejects(registry.get('missing'), NotFoundError);
    assert.strictEqual(registry.handler('missing'), undefined);
  });

  test('refuses invalid or duplicate definitions', () => {
    const db = openDatabase(':memory:');
    assert.throws(() => new ProcessRegistry(db, [echoProcess, echoProcess]), /defined twice/);
    assert.throws(
      () => new ProcessRegistry(db, [{ ...echoProcess, id: 'bad id' }]),
      /id may only contain/
    );
    assert.throws(() => new ProcessRegistry(db, [{ ...echoProcess, outputs: {} }]), /at least one output/);
  });
});

describe('parseExecuteRequest', () => {
  test('accepts an empty body', () => {
    assert.deepStrictEqual(parseExecuteRequest(undefined), {});
    assert.deepStrictEqual(parseExecuteRequest({}), {});
  });

  test('keeps the known members', () => {
    assert.deepStrictEqual(
      parseExecuteRequest({ inputs: { a: 1 }, response: 'document', subscriber: { successUri: 'http://cb.test' } }),
      { inputs: { a: 1 }, response: 'document', subscriber: { successUri: 'http://cb.test' } }
    );
  });

  test('rejects malformed members', () => {
    assert.throws(() => parseExecuteRequest([1, 2]), ValidationError);
    assert.throws(() => parseExecuteRequest({ inputs: [1] }), /inputs must be an object/);
    assert.throws(() => parseExecuteRequest({ response: 'stream' }), /response must be/);
    assert.throws(() => parseExecuteRequest({ subscriber: { successUri: 5 } }), /subscriber.successUri/);
  });
});

describe('validateInputs', () => {
  const process: ProcessDescription = {
    id: 'demo',
    version: '1.0.0',
    jobControlOptions: ['async-execute'],
    inputs: {
      name: { schema: { type: 'string' } },
      tags: { schema: { type: 'string' }, minOccurs: 0, maxOccurs: 'unbounded' },
      pair: { schema: { type: 'number' }, minOccurs: 0, maxOccurs: 2 },
    },
    outputs: { out: { schema: {} } },
  };

  test('accepts matching inputs', () => {
    validateInputs(process, { name: 'a', tags: ['x', 'y', 'z'], pair: [1, 2] });
    validateInputs(process, { name: 'a' });
  });

  test('rejects unknown, missing and mistyped inputs', () => {
    assert.throws(() => validateInputs(process, { name: 'a', extra: 1 }), /Unknown input "extra"/);
    assert.throws(() => validateInputs(process, {}), /Missing required input "name"/);
    assert.throws(() => validateInputs(process, { name: 3 }), /must be of type string/);
    assert.throws(() => validateInputs(process, { name: 'a', pair: [1, 2, 3] }), /at most 2/);
  });
});

describe('boundingBox', () => {
  test('covers a polygon', () => {
    assert.deepStrictEqual(
      boundingBox({ type: 'Polygon', coordinates: [[[0, 0], [4, 1], [2, 5], [-1, 3], [0, 0]]] }),
      [-1, 0, 4, 5]
    );
  });

  test('covers a point and a geometry collection', () => {
    assert.deepStrictEqual(boundingBox({ type: 'Point', coordinates: [7, 8] }), [7, 8, 7, 8]);
    assert.deepStrictEqual(
      boundingBox({
        type: 'GeometryCollection',
        geometries: [
          { type: 'Point', coordinates: [1, 1] },
          { type: 'LineString', coordinates: [[-3, 2], [5, -6]] },
        ],
      }),
      [-3, -6, 5, 2]
    );
  });

  test('rejects what is not a geometry', () => {
    assert.throws(() => boundingBox({ type: 'Circle', coordinates: [0, 0] }), /Unsupported geometry type/);
    assert.throws(() => boundingBox({ type: 'Point', coordinates: ['a', 1] }), /Invalid GeoJSON position/);
    assert.throws(() => boundingBox('nope'), /GeoJSON geometry object/);
  });
});
