import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Course } from './course.entity';

@Entity('course_groups')
export class CourseGroup {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  courseId!: string;

  @ManyToOne(() => Course, (course) => course.groups, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'courseId' })
  course!: Course;

  @Column()
  name!: string;

  @Column({ type: 'varchar', length: 100, nullable: true })
  idNumber!: string | null;
}
