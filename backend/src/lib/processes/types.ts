import type { InputDescription, JobControlOption, OutputDescription, TransmissionMode } from '@geoapi/shared';
import type { JobInputs, JobResult } from '../jobs/model.js';

/** Catalog entry as stored; links are computed per request. */
export interface ProcessDescription {
  id: string;
  title?: string;
  description?: string;
  version: string;
  keywords?: string[];
  jobControlOptions: JobControlOption[];
  outputTransmission?: TransmissionMode[];
  inputs: Record<string, InputDescription>;
  outputs: Record<string, OutputDescription>;
}

export interface ProcessContext {
  jobId: string;
  /** Aborted when the job is dismissed. */
  signal: AbortSignal;
  reportProgress(percent: number): Promise<void>;
}

/** The unit of work behind a process. Opaque to the job engine. */
export type ProcessHandler = (inputs: JobInputs, ctx: ProcessContext) => Promise<JobResult>;

export interface ProcessDefinition extends ProcessDescription {
  execute: ProcessHandler;
}

export function validateProcessDefinition(definition: ProcessDefinition): void {
  const { id } = definition;
  if (!/^[A-Za-z0-9_.-]+$/.test(id)) {
    throw new Error(`Process "${id}": id may only contain letters, digits, '.', '_' and '-'`);
  }
  if (!definition.version || definition.version.trim() === '') {
    throw new Error(`Process "${id}": version is required`);
  }
  if (definition.jobControlOptions.length === 0) {
    throw new Error(`Process "${id}": at least one job control option is required`);
  }
  if (Object.keys(definition.outputs).length === 0) {
    throw new Error(`Process "${id}": at least one output is required`);
  }
  for (const [name, input] of Object.entries(definition.inputs)) {
    const min = input.minOccurs ?? 1;
    const max = input.maxOccurs ?? 1;
    if (!Number.isInteger(min) || min < 0) {
      throw new Error(`Process "${id}": input "${name}" has an invalid minOccurs`);
    }
    if (max !== 'unbounded' && (!Number.isInteger(max) || max < Math.max(1, min))) {
      throw new Error(`Process "${id}": input "${name}" has an invalid maxOccurs`);
    }
  }
}
