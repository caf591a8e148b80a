import type {
  InputDescription,
  JobControlOption,
  JsonSchema,
  OutputDescription,
  TransmissionMode,
} from '@geoapi/shared';
import type { Db } from '../db/client.js';
import { runStatement } from '../db/errors.js';
import { isRecord, parseJsonObject } from '../db/json.js';
import { NotFoundError } from '../http/errors.js';
import { logger } from '../logger/logger.js';
import type { PageRequest } from '../jobs/model.js';
import type { ProcessDefinition, ProcessDescription, ProcessHandler } from './types.js';
import { validateProcessDefinition } from './types.js';

type ProcessRow = {
  id: string;
  summary: string;
  inputs: string;
  outputs: string;
};

const JOB_CONTROL_OPTIONS: readonly JobControlOption[] = ['sync-execute', 'async-execute', 'dismiss'];
const TRANSMISSION_MODES: readonly TransmissionMode[] = ['value', 'reference'];
const SCHEMA_TYPES = ['string', 'number', 'integer', 'boolean', 'object', 'array', 'null'] as const;

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function pickAll<T extends string>(value: unknown, allowed: readonly T[]): T[] {
  if (!Array.isArray(value)) return [];
  const out: T[] = [];
  for (const item of value) {
    const match = allowed.find(candidate => candidate === item);
    if (match) out.push(match);
  }
  return out;
}

function toSchema(value: unknown): JsonSchema {
  if (!isRecord(value)) return {};
  const schema: JsonSchema = {};
  for (const [keyword, entry] of Object.entries(value)) {
    if (keyword !== 'type') schema[keyword] = entry;
  }
  const schemaType = SCHEMA_TYPES.find(candidate => candidate === value.type);
  if (schemaType) schema.type = schemaType;
  return schema;
}

function toInputs(value: Record<string, unknown>): Record<string, InputDescription> {
  const out: Record<string, InputDescription> = {};
  for (const [name, raw] of Object.entries(value)) {
    if (!isRecord(raw)) continue;
    const input: InputDescription = { schema: toSchema(raw.schema) };
    const title = optionalString(raw.title);
    const description = optionalString(raw.description);
    if (title !== undefined) input.title = title;
    if (description !== undefined) input.description = description;
    if (typeof raw.minOccurs === 'number') input.minOccurs = raw.minOccurs;
    if (typeof raw.maxOccurs === 'number' || raw.maxOccurs === 'unbounded') input.maxOccurs = raw.maxOccurs;
    out[name] = input;
  }
  return out;
}

function toOutputs(value: Record<string, unknown>): Record<string, OutputDescription> {
  const out: Record<string, OutputDescription> = {};
  for (const [name, raw] of Object.entries(value)) {
    if (!isRecord(raw)) continue;
    const output: OutputDescription = { schema: toSchema(raw.schema) };
    const title = optionalString(raw.title);
    const description = optionalString(raw.description);
    if (title !== undefined) output.title = title;
    if (description !== undefined) output.description = description;
    out[name] = output;
  }
  return out;
}

function toDescription(row: ProcessRow): ProcessDescription {
  const summary = parseJsonObject(row.summary, 'processes.summary');
  const description: ProcessDescription = {
    id: row.id,
    version: optionalString(summary.version) ?? '1.0.0',
    jobControlOptions: pickAll(summary.jobControlOptions, JOB_CONTROL_OPTIONS),
    inputs: toInputs(parseJsonObject(row.inputs, 'processes.inputs')),
    outputs: toOutputs(parseJsonObject(row.outputs, 'processes.outputs')),
  };
  const title = optionalString(summary.title);
  const text = optionalString(summary.description);
  if (title !== undefined) description.title = title;
  if (text !== undefined) description.description = text;
  if (Array.isArray(summary.keywords)) {
    description.keywords = summary.keywords.filter((k): k is string => typeof k === 'string');
  }
  const transmission = pickAll(summary.outputTransmission, TRANSMISSION_MODES);
  if (transmission.length) description.outputTransmission = transmission;
  return description;
}

/**
 * Read-only process catalog backed by the `processes` table. Definitions
 * passed in are validated up front (fail fast) and upserted by `seed()`;
 * rows administered out of band are listed too, but only definitions carry
 * a handler.
 */
export class ProcessRegistry {
  private readonly definitions = new Map<string, ProcessDefinition>();

  constructor(private readonly db: Db, definitions: readonly ProcessDefinition[] = []) {
    for (const definition of definitions) {
      validateProcessDefinition(definition);
      if (this.definitions.has(definition.id)) {
        throw new Error(`Process "${definition.id}" is defined twice`);
      }
      this.definitions.set(definition.id, definition);
    }
  }

  seed(): number {
    const upsert = this.db.prepare(
      `INSERT INTO processes (id, summary, inputs, outputs) VALUES (?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET summary = excluded.summary, inputs = excluded.inputs, outputs = excluded.outputs`
    );
    const seedAll = this.db.transaction((definitions: ProcessDefinition[]) => {
      for (const { execute: _execute, id, inputs, outputs, ...summary } of definitions) {
        upsert.run(id, JSON.stringify(summary), JSON.stringify(inputs), JSON.stringify(outputs));
      }
    });
    const definitions = Array.from(this.definitions.values());
    runStatement('process seed', () => seedAll(definitions));
    logger.info('Process catalog seeded', { processes: definitions.map(d => d.id) });
    return definitions.length;
  }

  async list(page: PageRequest): Promise<{ processes: ProcessDescription[]; total: number }> {
    const read = this.db.transaction(() => {
      const counted = this.db
        .prepare<unknown[], { count: number }>('SELECT COUNT(*) AS count FROM processes')
        .get();
      const rows = this.db
        .prepare<unknown[], ProcessRow>('SELECT id, summary, inputs, outputs FROM processes ORDER BY id LIMIT ? OFFSET ?')
        .all(page.limit, page.offset);
      return { total: counted?.count ?? 0, rows };
    });
    const { total, rows } = runStatement('process list', () => read());
    return { processes: rows.map(toDescription), total };
  }

  async get(processId: string): Promise<ProcessDescription> {
    const row = runStatement('process read', () =>
      this.db
        .prepare<unknown[], ProcessRow>('SELECT id, summary, inputs, outputs FROM processes WHERE id = ?')
        .get(processId)
    );
    if (!row) throw new NotFoundError('process', processId);
    return toDescription(row);
  }

  handler(processId: string): ProcessHandler | undefined {
    return this.definitions.get(processId)?.execute;
  }
}
