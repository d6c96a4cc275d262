import { Module } from '@nestjs/common'
import { GpxModule } from '../gpx/gpx.module'
import { HeartRateIndexService } from './heart-rate-index.service'

@Module({
  imports: [GpxModule],
  providers: [HeartRateIndexService],
  exports: [HeartRateIndexService],
})
export class HeartRateModule {}
