import { randomUUID } from 'node:crypto'
import type { Server as HttpServer } from 'node:http'
import { WebSocketServer } from 'ws'
import type WebSocket from 'ws'
import type { RawData } from 'ws'
import type {
  ServerEventType,
  WsMessage,
  WsSubscribeTopic
} from '@geoapi/shared'
import { isRecord } from '../lib/db/json.js'
import { logger } from '../lib/logger/logger.js'
import type { WsContext } from './types.js'
import { initNotifier, makeServerEvent } from './notify.js'
import { topicKey } from './topics.js'

const HEARTBEAT_INTERVAL_MS = 25000
const MAX_TOPICS = 100

export type WsServerOptions = {
  path?: string
  heartbeatIntervalMs?: number
}

export function createWsServer(server: HttpServer, options: WsServerOptions = {}) {
  const path = options.path ?? '/ws'
  const wss = new WebSocketServer({ server, path })
  const contexts = new Map<string, WsContext>()
  const missedPongs = new WeakMap<WebSocket, number>()

  initNotifier(({ event, targets }) => {
    emitToTargets(event, targets)
  })

  const heartbeatTimer = setInterval(() => {
    for (const socket of wss.clients) {
      const missed = missedPongs.get(socket) ?? 0
      if (missed >= 1) {
        socket.terminate()
        missedPongs.delete(socket)
        continue
      }
      missedPongs.set(socket, missed + 1)
      socket.ping()
    }
  }, options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS)
  heartbeatTimer.unref()

  wss.on('close', () => {
    clearInterval(heartbeatTimer)
    initNotifier(null)
  })

  wss.on('connection', (socket: WebSocket) => {
    const socketId = randomUUID()
    const ctx: WsContext = {
      socketId,
      socket,
      subscriptions: new Set<string>()
    }
    contexts.set(socketId, ctx)
    missedPongs.set(socket, 0)
    logger.debug('WebSocket connected', { socketId })

    socket.on('pong', () => {
      missedPongs.set(socket, 0)
    })

    socket.on('message', (data: RawData) => {
      const topics = parseSubscribe(data)
      if (!topics) {
        send(ctx, makeServerEvent('server.system.error', {
          message: 'Expected a client.system.subscribe message with a topics list',
          code: 'bad_message'
        }))
        return
      }
      ctx.subscriptions.clear()
      for (const topic of topics) ctx.subscriptions.add(topicKey(topic))
      send(ctx, makeServerEvent('server.system.subscribed', { topics }))
    })

    socket.on('close', () => {
      missedPongs.delete(socket)
      contexts.delete(socketId)
      logger.debug('WebSocket closed', { socketId })
    })

    socket.on('error', err => {
      logger.warn('WebSocket error', { socketId, error: err })
    })
  })

  return wss

  function emitToTargets(event: WsMessage<ServerEventType>, targets: WsSubscribeTopic[]) {
    const keys = new Set(targets.map(topicKey))
    for (const ctx of contexts.values()) {
      for (const key of keys) {
        if (ctx.subscriptions.has(key)) {
          send(ctx, event)
          break
        }
      }
    }
  }
}

function send(ctx: WsContext, msg: WsMessage<ServerEventType>) {
  if (ctx.socket.readyState !== ctx.socket.OPEN) return
  ctx.socket.send(JSON.stringify(msg))
}

function parseTopic(value: unknown): WsSubscribeTopic | null {
  if (!isRecord(value)) return null
  if (value.kind === 'jobs' && value.id === '*') return { kind: 'jobs', id: '*' }
  if (value.kind === 'job' && typeof value.id === 'string' && value.id) {
    return { kind: 'job', id: value.id }
  }
  return null
}

function parseSubscribe(data: RawData): WsSubscribeTopic[] | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(data.toString())
  } catch {
    return null
  }
  if (!isRecord(parsed) || parsed.type !== 'client.system.subscribe') return null
  const payload = parsed.data
  if (!isRecord(payload) || !Array.isArray(payload.topics)) return null
  if (payload.topics.length > MAX_TOPICS) return null

  const topics: WsSubscribeTopic[] = []
  for (const raw of payload.topics) {
    const topic = parseTopic(raw)
    if (!topic) return null
    topics.push(topic)
  }
  return topics
}
