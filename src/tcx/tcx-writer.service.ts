import { Injectable } from '@nestjs/common'
import { writeFileSync } from 'fs'
import { buildTcx } from './tcx-document'
import type { TcxActivity } from './tcx-document'

@Injectable()
export class TcxWriterService {
  /** Overwrites `path`. A failure part-way leaves whatever was written. */
  write(path: string, activity: TcxActivity): void {
    writeFileSync(path, buildTcx(activity), 'utf8')
  }
}
