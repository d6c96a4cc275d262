#!/usr/bin/env node
import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { MergeCommand } from './merge/merge.command'

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  })

  const { exitCode } = app.get(MergeCommand).run(process.argv.slice(2))
  await app.close()
  process.exitCode = exitCode
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? (err.stack ?? err.message) : String(err))
  process.exitCode = 1
})
