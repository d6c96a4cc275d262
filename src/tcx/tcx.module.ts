import { Module } from '@nestjs/common'
import { TcxWriterService } from './tcx-writer.service'

@Module({
  providers: [TcxWriterService],
  exports: [TcxWriterService],
})
export class TcxModule {}
