import type { Link } from './common.js'

export type JobControlOption = 'sync-execute' | 'async-execute' | 'dismiss'
export type TransmissionMode = 'value' | 'reference'

export type JsonSchema = {
  type?: 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array' | 'null'
  [keyword: string]: unknown
}

export type InputDescription = {
  title?: string
  description?: string
  schema: JsonSchema
  minOccurs?: number
  maxOccurs?: number | 'unbounded'
}

export type OutputDescription = {
  title?: string
  description?: string
  schema: JsonSchema
}

export type ProcessSummary = {
  id: string
  title?: string
  description?: string
  version: string
  keywords?: string[]
  jobControlOptions: JobControlOption[]
  outputTransmission?: TransmissionMode[]
  links: Link[]
}

export type Process = ProcessSummary & {
  inputs: Record<string, InputDescription>
  outputs: Record<string, OutputDescription>
}

export type ProcessList = {
  processes: ProcessSummary[]
  links: Link[]
  numberMatched?: number
  numberReturned?: number
}

export type Execute = {
  inputs?: Record<string, unknown>
  outputs?: Record<string, unknown>
  response?: 'raw' | 'document'
  subscriber?: {
    successUri?: string
    inProgressUri?: string
    failedUri?: string
  }
}

export type Results = Record<string, unknown>
