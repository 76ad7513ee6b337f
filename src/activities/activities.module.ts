import { Module } from '@nestjs/common'
import { ActivitiesController } from './activities.controller'
import { ActivitiesService } from './activities.service'
import { ACTIVITY_SEED, DEFAULT_ACTIVITY_SEED } from './activities.seed'

@Module({
  controllers: [ActivitiesController],
  providers: [
    ActivitiesService,
    { provide: ACTIVITY_SEED, useValue: DEFAULT_ACTIVITY_SEED }, // override in tests for a custom roster
  ],
  exports: [ActivitiesService],
})
export class ActivitiesModule {}
