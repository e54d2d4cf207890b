import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TrackerClientService } from './tracker/tracker-client.service';
import { HrClientService } from './hr/hr-client.service';
import { SyncRunContextFactory } from './sync-run.context';

@Module({
	imports: [ConfigModule],
	providers: [TrackerClientService, HrClientService, SyncRunContextFactory],
	exports: [TrackerClientService, HrClientService, SyncRunContextFactory],
})
export class UpstreamModule {}
