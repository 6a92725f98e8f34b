import { EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { QuizOverride } from '../../quiz/entities/quiz-override.entity';
import { NewOverrideRecord, OverrideFilter, OverrideRecord, OverrideStore } from './override-store';

const toRecord = (entity: QuizOverride): OverrideRecord => ({
  id: entity.id,
  quizId: entity.quizId,
  userId: entity.userId ?? null,
  groupId: entity.groupId ?? null,
  timeOpen: entity.timeOpen ?? null,
  timeClose: entity.timeClose ?? null,
  timeLimit: entity.timeLimit ?? null,
  attempts: entity.attempts ?? null,
  password: entity.password ?? null,
});

export class TypeOrmOverrideStore implements OverrideStore {
  constructor(
    private readonly manager: EntityManager,
    private readonly inTransaction = false,
  ) {}

  private get repository(): Repository<QuizOverride> {
    return this.manager.getRepository(QuizOverride);
  }

  async exists(filter: OverrideFilter): Promise<boolean> {
    return (await this.repository.count({ where: this.where(filter) })) > 0;
  }

  async get(filter: OverrideFilter): Promise<OverrideRecord | null> {
    const entity = await this.repository.findOne({ where: this.where(filter) });
    return entity ? toRecord(entity) : null;
  }

  async list(quizId: string): Promise<OverrideRecord[]> {
    const entities = await this.repository.find({ where: { quizId } });
    return entities.map(toRecord);
  }

  async insert(record: NewOverrideRecord): Promise<string> {
    const saved = await this.repository.save(this.repository.create(record));
    return saved.id;
  }

  async update(record: OverrideRecord): Promise<void> {
    const { id, ...values } = record;
    const result = await this.repository.update({ id }, values);
    if (!result.affected) {
      throw new Error(`Override ${id} no longer exists`);
    }
  }

  async delete(id: string): Promise<void> {
    const result = await this.repository.delete({ id });
    if (!result.affected) {
      throw new Error(`Override ${id} no longer exists`);
    }
  }

  async transaction<T>(work: (store: OverrideStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) return work(this);
    return this.manager.transaction((trx) => work(new TypeOrmOverrideStore(trx, true)));
  }

  private where(filter: OverrideFilter): FindOptionsWhere<QuizOverride> {
    const where: FindOptionsWhere<QuizOverride> = { quizId: filter.quizId };
    if (filter.userId !== undefined) where.userId = filter.userId;
    if (filter.groupId !== undefined) where.groupId = filter.groupId;
    return where;
  }
}
