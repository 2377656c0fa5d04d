import { Module } from '@nestjs/common';
import { FS_OPS, nodeFsOps } from './fs-ops';
import { LatestPointerService } from './latest-pointer.service';
import { RunDirectoryService } from './run-directory.service';
import { RunPointerAccessor } from './run-pointer.accessor';

@Module({
  providers: [
    { provide: FS_OPS, useValue: nodeFsOps },
    RunDirectoryService,
    LatestPointerService,
    RunPointerAccessor,
  ],
  exports: [FS_OPS, RunDirectoryService, LatestPointerService, RunPointerAccessor],
})
export class RunsModule {}
