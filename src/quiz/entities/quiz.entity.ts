// src/quiz/entities/quiz.entity.ts
import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, OneToMany } from 'typeorm';
import { Course } from '../../course/entities/course.entity';
import { QuizOverride } from './quiz-override.entity';

@Entity('quizzes')
export class Quiz {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  courseId!: string;

  @ManyToOne(() => Course, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'courseId' })
  course!: Course;

  @Column()
  name!: string;

  // Quiz-wide defaults; overrides replace these per user or group
  @Column({ type: 'timestamptz', nullable: true })
  timeOpen!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  timeClose!: Date | null;

  @Column({ type: 'integer', nullable: true })
  timeLimit!: number | null;

  @Column({ type: 'integer', nullable: true })
  attempts!: number | null;

  @OneToMany(() => QuizOverride, (override) => override.quiz)
  overrides!: QuizOverride[];
}
