import type { Link } from './common.js'

export type StatusCode = 'accepted' | 'running' | 'successful' | 'failed' | 'dismissed'

/** Job status document. Never carries the result body. */
export type StatusInfo = {
  jobID: string
  processID: string
  type: 'process'
  status: StatusCode
  message?: string
  created: string
  started?: string
  finished?: string
  updated?: string
  progress?: number
  links: Link[]
}

export type JobList = {
  jobs: StatusInfo[]
  links: Link[]
  numberMatched?: number
  numberReturned?: number
}
