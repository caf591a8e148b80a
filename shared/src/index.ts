export type { Link, LandingPage, Conformance, Exception } from './ogc/common.js'
export type {
  Execute,
  InputDescription,
  JobControlOption,
  JsonSchema,
  OutputDescription,
  Process,
  ProcessList,
  ProcessSummary,
  Results,
  TransmissionMode
} from './ogc/processes.js'
export type { JobList, StatusCode, StatusInfo } from './ogc/jobs.js'
export type {
  ClientEventType,
  ServerEventType,
  WsEnvelope,
  WsEventType,
  WsEvents,
  WsMessage,
  WsSubscribeTopic
} from './ws/contracts.js'
