// src/course/entities/course.entity.ts
import { Entity, PrimaryGeneratedColumn, Column, OneToMany, CreateDateColumn } from 'typeorm';
import { CourseGroup } from './course-group.entity';

@Entity('courses')
export class Course {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  code!: string;

  @Column()
  name!: string;

  @OneToMany(() => CourseGroup, (group) => group.course)
  groups!: CourseGroup[];

  @CreateDateColumn()
  createdAt!: Date;
}
