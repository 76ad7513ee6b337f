export interface ActivitySnapshot {
  description: string
  schedule: string
  max_participants: number
  participants: string[]
}

// activity name -> activity, in seed order
export type ActivitiesSnapshot = Record<string, ActivitySnapshot>

export type ActivitySeed = Record<string, ActivitySnapshot>

export interface MessageResponse {
  message: string
}
