import type {
  ServerEventType,
  WsEvents,
  WsMessage,
  WsSubscribeTopic
} from '@geoapi/shared'

export type WsNotifyPayload = {
  event: WsMessage<ServerEventType>
  targets: WsSubscribeTopic[]
}

type EmitFn = (payload: WsNotifyPayload) => void

let emit: EmitFn | null = null

export function initNotifier(fn: EmitFn | null) {
  emit = fn
}

export function makeServerEvent<T extends ServerEventType>(
  type: T,
  data: WsEvents[T]
): WsMessage<T> {
  return { type, data, ts: Date.now() }
}

export function notify(payload: WsNotifyPayload) {
  emit?.(payload)
}
