import { Inject, Injectable, Logger } from '@nestjs/common'
import { ActivitiesSnapshot, ActivitySeed, ActivitySnapshot, MessageResponse } from './activities.dto'
import {
  ActivityFullError,
  ActivityNotFoundError,
  AlreadyRegisteredError,
  NotRegisteredError,
} from './activities.errors'
import { ACTIVITY_SEED, parseActivitySeed } from './activities.seed'

/**
 * In-memory activity registry. One instance per application; state lives
 * as long as the process and is rebuilt from the seed on `reset()`.
 *
 * Every operation is synchronous, so the event loop serializes concurrent
 * requests and the capacity/uniqueness checks cannot interleave.
 */
@Injectable()
export class ActivitiesService {
  private readonly log = new Logger('ActivitiesService')
  private readonly seed: ActivitySeed
  private activities = new Map<string, ActivitySnapshot>()

  constructor(@Inject(ACTIVITY_SEED) seed: ActivitySeed) {
    this.seed = parseActivitySeed(seed)
    this.reset()
  }

  /** Restores every activity to its seeded roster. */
  reset(): void {
    this.activities = new Map(
      Object.entries(this.seed).map(([name, a]) => [name, { ...a, participants: [...a.participants] }]),
    )
  }

  listActivities(): ActivitiesSnapshot {
    return Object.fromEntries(
      [...this.activities].map(([name, a]) => [name, { ...a, participants: [...a.participants] }]),
    )
  }

  // existence, then duplicate, then capacity
  enroll(activityName: string, email: string): MessageResponse {
    const activity = this.find(activityName)

    if (activity.participants.includes(email)) {
      this.log.warn(`Rejected signup: ${email} already in "${activityName}"`)
      throw new AlreadyRegisteredError(activityName, email)
    }
    if (activity.participants.length >= activity.max_participants) {
      this.log.warn(`Rejected signup: "${activityName}" is full (${activity.max_participants})`)
      throw new ActivityFullError(activityName)
    }

    activity.participants.push(email)
    this.log.log(
      `Signed up ${email} for "${activityName}" (${activity.participants.length}/${activity.max_participants})`,
    )
    return { message: `Signed up ${email} for ${activityName}` }
  }

  withdraw(activityName: string, email: string): MessageResponse {
    const activity = this.find(activityName)

    const idx = activity.participants.indexOf(email)
    if (idx === -1) {
      this.log.warn(`Rejected unregister: ${email} not in "${activityName}"`)
      throw new NotRegisteredError(activityName, email)
    }

    activity.participants.splice(idx, 1)
    this.log.log(`Unregistered ${email} from "${activityName}"`)
    return { message: `Unregistered ${email} from ${activityName}` }
  }

  private find(activityName: string): ActivitySnapshot {
    const activity = this.activities.get(activityName)
    if (!activity) {
      this.log.warn(`Unknown activity "${activityName}"`)
      throw new ActivityNotFoundError(activityName)
    }
    return activity
  }
}
