import {
  BadRequestException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common'
import { ActivitiesService } from './activities.service'
import { ActivitiesSnapshot, MessageResponse } from './activities.dto'
import { ActivityNotFoundError, ActivityRegistryError } from './activities.errors'

@Controller('activities')
export class ActivitiesController {
  constructor(private readonly svc: ActivitiesService) {}

  @Get()
  list(): ActivitiesSnapshot {
    return this.svc.listActivities()
  }

  @Post(':activityName/signup')
  @HttpCode(HttpStatus.OK)
  signup(
    @Param('activityName') activityName: string,
    @Query('email') email?: string | string[],
  ): MessageResponse {
    const student = requireEmail(email)
    try {
      return this.svc.enroll(activityName, student)
    } catch (e) {
      throw toHttpException(e)
    }
  }

  @Post(':activityName/unregister')
  @HttpCode(HttpStatus.OK)
  unregister(
    @Param('activityName') activityName: string,
    @Query('email') email?: string | string[],
  ): MessageResponse {
    const student = requireEmail(email)
    try {
      return this.svc.withdraw(activityName, student)
    } catch (e) {
      throw toHttpException(e)
    }
  }
}

// ?email=a&email=b arrives as an array; only a single non-empty value is accepted
function requireEmail(email: string | string[] | undefined): string {
  if (typeof email !== 'string' || email.length === 0) {
    throw new BadRequestException('email is required')
  }
  return email
}

function toHttpException(e: unknown): unknown {
  if (e instanceof ActivityNotFoundError) return new NotFoundException(e.message)
  if (e instanceof ActivityRegistryError) return new BadRequestException(e.message)
  return e
}
