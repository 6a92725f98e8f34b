import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  username!: string;

  // Institution-assigned identifier, e.g. a student number
  @Column({ type: 'varchar', length: 100, nullable: true })
  idNumber!: string | null;

  @Column()
  firstName!: string;

  @Column()
  lastName!: string;

  // Explicit type to avoid reflect-metadata emitting Object for union (string | null)
  @Column({ type: 'varchar', length: 255, unique: true, nullable: true })
  email!: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}
