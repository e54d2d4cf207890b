import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheModule } from '@nestjs/cache-manager';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { LibModule } from './lib/lib.module';
import { UpstreamModule } from './upstream/upstream.module';
import { RosterModule } from './roster/roster.module';
import { AttendanceModule } from './attendance/attendance.module';
import { AuditModule } from './audit/audit.module';
import { RosterEntry } from './roster/entities/roster-entry.entity';
import { AttendanceRecord } from './attendance/entities/attendance-record.entity';
import { AuditLog } from './audit/entities/audit-log.entity';

@Module({
	imports: [
		ConfigModule.forRoot({
			isGlobal: true,
		}),
		CacheModule.register({
			ttl: parseInt(process.env.CACHE_EXPIRATION_TIME || '300', 10) * 1000, // 5 minutes default
			max: parseInt(process.env.CACHE_MAX_ITEMS || '1000', 10) || 1000,
			isGlobal: true,
		}),
		EventEmitterModule.forRoot(),
		ScheduleModule.forRoot(),
		TypeOrmModule.forRootAsync({
			imports: [ConfigModule],
			useFactory: (configService: ConfigService) => ({
				type: 'mysql',
				host: configService.get<string>('DATABASE_HOST'),
				port: parseInt(configService.get<string>('DATABASE_PORT') || '', 10) || 3306,
				username: configService.get<string>('DATABASE_USER'),
				password: configService.get<string>('DATABASE_PASSWORD'),
				database: configService.get<string>('DATABASE_NAME'),
				entities: [RosterEntry, AttendanceRecord, AuditLog],
				synchronize: configService.get<string>('DATABASE_SYNCHRONIZE') === 'true',
				logging: false,
				// DATE columns stay YYYY-MM-DD strings instead of shifting through a JS Date
				dateStrings: ['DATE'],
				extra: {
					connectionLimit: parseInt(configService.get<string>('DB_CONNECTION_LIMIT') || '10', 10),
					charset: 'utf8mb4',
				},
				timezone: 'Z',
				retryAttempts: 10,
				retryDelay: 1000,
				autoLoadEntities: false,
			}),
			inject: [ConfigService],
		}),
		LibModule,
		UpstreamModule,
		RosterModule,
		AttendanceModule,
		AuditModule,
	],
})
export class AppModule {}
