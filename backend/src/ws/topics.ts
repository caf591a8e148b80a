import type { WsSubscribeTopic } from '@geoapi/shared'

export function topicKey(topic: WsSubscribeTopic) {
  return `${topic.kind}:${topic.id}`
}

export function jobTopic(jobId: string): WsSubscribeTopic {
  return { kind: 'job', id: jobId }
}

export const allJobsTopic: WsSubscribeTopic = { kind: 'jobs', id: '*' }
