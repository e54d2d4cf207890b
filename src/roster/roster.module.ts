import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UpstreamModule } from '../upstream/upstream.module';
import { RosterEntry } from './entities/roster-entry.entity';
import { hierarchyTableProvider } from './config/hierarchy-table.config';
import { IdentityResolverService } from './services/identity-resolver.service';
import { RosterMergeService } from './services/roster-merge.service';
import { HierarchyNormalizerService } from './services/hierarchy-normalizer.service';
import { RosterDiffService } from './services/roster-diff.service';
import { RosterSyncService } from './services/roster-sync.service';
import { RosterService } from './roster.service';
import { RosterScheduler } from './roster.scheduler';

@Module({
	imports: [ConfigModule, UpstreamModule, TypeOrmModule.forFeature([RosterEntry])],
	providers: [
		hierarchyTableProvider,
		IdentityResolverService,
		RosterMergeService,
		HierarchyNormalizerService,
		RosterDiffService,
		RosterService,
		RosterSyncService,
		RosterScheduler,
	],
	exports: [IdentityResolverService, RosterService, RosterSyncService, RosterDiffService, TypeOrmModule],
})
export class RosterModule {}
