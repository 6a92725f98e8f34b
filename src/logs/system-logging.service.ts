import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Log, LogLevel } from './logs.entity';

export interface LogEntry {
  action: string;
  module: string;
  level: LogLevel;
  entityId?: string;
  entityType?: string;
  newValues?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  ipAddress?: string;
  userAgent?: string;
  errorMessage?: string;
  stackTrace?: string;
}

@Injectable()
export class SystemLoggingService {
  private readonly logger = new Logger(SystemLoggingService.name);

  constructor(
    @InjectRepository(Log)
    private logRepository: Repository<Log>,
  ) {}

  async logAction(logEntry: LogEntry): Promise<void> {
    try {
      const log = this.logRepository.create({
        action: logEntry.action,
        module: logEntry.module,
        level: logEntry.level,
        entityId: logEntry.entityId,
        entityType: logEntry.entityType,
        newValues: logEntry.newValues,
        metadata: {
          ...logEntry.metadata,
          timestamp: new Date().toISOString(),
          errorMessage: logEntry.errorMessage,
          stackTrace: logEntry.stackTrace,
        },
        ipAddress: logEntry.ipAddress,
        userAgent: logEntry.userAgent,
      });

      await this.logRepository.save(log);

      const message = `[${logEntry.module}] ${logEntry.action}`;
      const context = { entityId: logEntry.entityId, entityType: logEntry.entityType };

      switch (logEntry.level) {
        case 'error':
          this.logger.error(message, logEntry.stackTrace, context);
          break;
        case 'warn':
          this.logger.warn(message, context);
          break;
        case 'debug':
          this.logger.debug(message, context);
          break;
        default:
          this.logger.log(message, context);
      }
    } catch (error) {
      // An audit write must never fail the request that triggered it
      const stack = error instanceof Error ? error.stack : String(error);
      this.logger.error('Failed to save log entry', stack);
    }
  }

  async logSystemError(error: Error, module: string, action: string, metadata?: Record<string, unknown>): Promise<void> {
    await this.logAction({
      action: action || 'SYSTEM_ERROR',
      module: module || 'SYSTEM',
      level: 'error',
      errorMessage: error.message,
      stackTrace: error.stack,
      metadata: {
        ...metadata,
        description: 'System error occurred',
      },
    });
  }
}
