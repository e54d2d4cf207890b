import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UpstreamModule } from '../upstream/upstream.module';
import { RosterModule } from '../roster/roster.module';
import { AttendanceRecord } from './entities/attendance-record.entity';
import { AttendanceCalculatorService } from './services/attendance-calculator.service';
import { AttendanceSyncService } from './services/attendance-sync.service';
import { AttendanceService } from './attendance.service';
import { AttendanceScheduler } from './attendance.scheduler';

@Module({
	imports: [ConfigModule, UpstreamModule, RosterModule, TypeOrmModule.forFeature([AttendanceRecord])],
	providers: [AttendanceCalculatorService, AttendanceSyncService, AttendanceService, AttendanceScheduler],
	exports: [AttendanceCalculatorService, AttendanceSyncService, AttendanceService],
})
export class AttendanceModule {}
