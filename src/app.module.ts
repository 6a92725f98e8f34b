import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { UsersModule } from './user/users.module';
import { CourseModule } from './course/course.module';
import { QuizModule } from './quiz/quiz.module';
import { LogsModule } from './logs/logs.module';
import { OverrideImportModule } from './override-import/override-import.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    UsersModule,
    CourseModule,
    QuizModule,
    LogsModule,
    OverrideImportModule,
  ],
})
export class AppModule {}
