import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

/**
 * Long-running worker: no HTTP surface, the scheduled jobs do the work.
 */
async function bootstrap() {
	const app = await NestFactory.createApplicationContext(AppModule);
	app.enableShutdownHooks();

	const logger = new Logger('Bootstrap');
	const schedulerEnabled = process.env.SYNC_SCHEDULER_ENABLED === 'true';
	logger.log(`Attendance reconciler started (scheduler ${schedulerEnabled ? 'enabled' : 'disabled'})`);
}

bootstrap().catch((error: unknown) => {
	new Logger('Bootstrap').error(`Failed to start: ${error instanceof Error ? error.message : String(error)}`);
	process.exit(1);
});
