// src/quiz/entities/quiz-override.entity.ts
import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Quiz } from './quiz.entity';

/**
 * A per-user or per-group exception to a quiz's timing, attempt and password settings.
 * Exactly one of userId / groupId is set.
 */
@Entity('quiz_overrides')
@Index(['quizId', 'userId'])
@Index(['quizId', 'groupId'])
export class QuizOverride {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  quizId!: string;

  @ManyToOne(() => Quiz, (quiz) => quiz.overrides, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'quizId' })
  quiz!: Quiz;

  @Column({ type: 'uuid', nullable: true })
  userId!: string | null;

  @Column({ type: 'uuid', nullable: true })
  groupId!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  timeOpen!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  timeClose!: Date | null;

  // Seconds
  @Column({ type: 'integer', nullable: true })
  timeLimit!: number | null;

  // Null means unlimited
  @Column({ type: 'integer', nullable: true })
  attempts!: number | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  password!: string | null;
}
