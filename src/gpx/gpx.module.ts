import { Module } from '@nestjs/common'
import { GpxReaderService } from './gpx-reader.service'

@Module({
  providers: [GpxReaderService],
  exports: [GpxReaderService],
})
export class GpxModule {}
