import rawSeed from './activities.seed.json'
import { ActivitySeed, ActivitySnapshot } from './activities.dto'

export const ACTIVITY_SEED = Symbol('ACTIVITY_SEED')

export const DEFAULT_ACTIVITY_SEED: ActivitySeed = rawSeed

function fail(name: string, reason: string): never {
  throw new Error(`Invalid activity seed for "${name}": ${reason}`)
}

function parseActivity(name: string, value: unknown): ActivitySnapshot {
  if (!value || typeof value !== 'object') fail(name, 'expected an object')
  const rec = value as Record<string, unknown>

  const { description, schedule, max_participants: max, participants } = rec
  if (typeof description !== 'string') fail(name, 'description must be a string')
  if (typeof schedule !== 'string') fail(name, 'schedule must be a string')
  if (typeof max !== 'number' || !Number.isInteger(max) || max <= 0) {
    fail(name, 'max_participants must be a positive integer')
  }
  if (!Array.isArray(participants) || !participants.every((p): p is string => typeof p === 'string')) {
    fail(name, 'participants must be a list of emails')
  }
  if (new Set(participants).size !== participants.length) fail(name, 'duplicate participant')
  if (participants.length > max) fail(name, `more than ${max} participants`)

  return { description, schedule, max_participants: max, participants: [...participants] }
}

/** Checks a seed dataset against the registry invariants and returns a private copy of it. */
export function parseActivitySeed(raw: unknown): ActivitySeed {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error('Invalid activity seed: expected an object keyed by activity name')
  }
  return Object.fromEntries(
    Object.entries(raw).map(([name, value]) => [name, parseActivity(name, value)]),
  )
}
