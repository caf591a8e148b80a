import type { StatusInfo } from '../ogc/jobs.js'

export type WsSubscribeTopic =
  | { kind: 'job'; id: string }
  | { kind: 'jobs'; id: '*' }

export type WsEnvelope<T extends string, P> = {
  type: T
  data: P
  ts: number
  id?: string
}

export type WsEvents = {
  'client.system.subscribe': {
    topics: WsSubscribeTopic[]
  }
  'server.system.subscribed': {
    topics: WsSubscribeTopic[]
  }
  'server.jobs.status': Omit<StatusInfo, 'links'>
  'server.system.error': { message: string; code?: string }
}

export type WsEventType = keyof WsEvents
export type ClientEventType = Extract<WsEventType, `client.${string}`>
export type ServerEventType = Extract<WsEventType, `server.${string}`>

export type WsMessage<T extends WsEventType> = WsEnvelope<T, WsEvents[T]>
