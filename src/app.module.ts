import { Module } from '@nestjs/common'
import { MergeConfigModule } from './config/merge-config.module'
import { MergeModule } from './merge/merge.module'

@Module({
  imports: [MergeConfigModule, MergeModule],
})
export class AppModule {}
