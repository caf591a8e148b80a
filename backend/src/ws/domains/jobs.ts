import type { Job } from '../../lib/jobs/model.js'
import { toStatusCore } from '../../lib/jobs/presenter.js'
import { makeServerEvent, notify } from '../notify.js'
import { allJobsTopic, jobTopic } from '../topics.js'

export function notifyJobStatus(job: Job) {
  notify({
    event: makeServerEvent('server.jobs.status', toStatusCore(job)),
    targets: [jobTopic(job.jobId), allJobsTopic]
  })
}
