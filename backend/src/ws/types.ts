import type WebSocket from 'ws'

export type WsContext = {
  socketId: string
  socket: WebSocket
  subscriptions: Set<string>
}
