import { Global, Module } from '@nestjs/common'
import { MERGE_CONFIG, defaultMergeConfig, mergeConfigSchema } from './merge.config'

@Global()
@Module({
  providers: [
    {
      provide: MERGE_CONFIG,
      useFactory: () => mergeConfigSchema.parse(defaultMergeConfig()),
    },
  ],
  exports: [MERGE_CONFIG],
})
export class MergeConfigModule {}
