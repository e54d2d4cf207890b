import { Global, Module } from '@nestjs/common';
import { CLOCK, SystemClock } from './interfaces/clock.interface';
import { SyncLockService } from './services/sync-lock.service';

@Global()
@Module({
	providers: [{ provide: CLOCK, useClass: SystemClock }, SyncLockService],
	exports: [CLOCK, SyncLockService],
})
export class LibModule {}
