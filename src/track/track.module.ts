import { Module } from '@nestjs/common'
import { HeartRateModule } from '../heart-rate/heart-rate.module'
import { TrackBuilderService } from './track-builder.service'

@Module({
  imports: [HeartRateModule],
  providers: [TrackBuilderService],
  exports: [TrackBuilderService],
})
export class TrackModule {}
