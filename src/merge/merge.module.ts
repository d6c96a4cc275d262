import { Module } from '@nestjs/common'
import { GpxModule } from '../gpx/gpx.module'
import { HeartRateModule } from '../heart-rate/heart-rate.module'
import { TcxModule } from '../tcx/tcx.module'
import { TrackModule } from '../track/track.module'
import { MergeCommand } from './merge.command'
import { MergeService } from './merge.service'

@Module({
  imports: [GpxModule, HeartRateModule, TrackModule, TcxModule],
  providers: [MergeService, MergeCommand],
  exports: [MergeService, MergeCommand],
})
export class MergeModule {}
