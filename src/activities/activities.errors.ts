/**
 * Rejections raised by the activity registry. All of them are expected,
 * caller-facing outcomes; the controller turns them into HTTP 4xx responses.
 */
export abstract class ActivityRegistryError extends Error {
  constructor(
    message: string,
    readonly activityName: string,
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class ActivityNotFoundError extends ActivityRegistryError {
  constructor(activityName: string) {
    super(`Activity ${activityName} not found`, activityName)
  }
}

export class AlreadyRegisteredError extends ActivityRegistryError {
  constructor(
    activityName: string,
    readonly email: string,
  ) {
    super(`Student ${email} is already signed up for ${activityName}`, activityName)
  }
}

export class ActivityFullError extends ActivityRegistryError {
  constructor(activityName: string) {
    super(`Activity ${activityName} is full`, activityName)
  }
}

export class NotRegisteredError extends ActivityRegistryError {
  constructor(
    activityName: string,
    readonly email: string,
  ) {
    super(`Student ${email} is not registered for ${activityName}`, activityName)
  }
}
