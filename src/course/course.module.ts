import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Course } from './entities/course.entity';
import { CourseGroup } from './entities/course-group.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Course, CourseGroup])],
  exports: [TypeOrmModule],
})
export class CourseModule {}
