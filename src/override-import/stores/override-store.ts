import { OverrideDraft } from '../override-import.types';

export type OverrideRecord = Omit<OverrideDraft, 'id'> & { id: string };
export type NewOverrideRecord = Omit<OverrideDraft, 'id'>;

export interface OverrideFilter {
  quizId: string;
  userId?: string;
  groupId?: string;
}

/**
 * Storage port for quiz overrides. `transaction` runs `work` against a store
 * bound to one transaction; a rejection rolls every write back.
 */
export interface OverrideStore {
  exists(filter: OverrideFilter): Promise<boolean>;
  get(filter: OverrideFilter): Promise<OverrideRecord | null>;
  list(quizId: string): Promise<OverrideRecord[]>;
  insert(record: NewOverrideRecord): Promise<string>;
  update(record: OverrideRecord): Promise<void>;
  delete(id: string): Promise<void>;
  transaction<T>(work: (store: OverrideStore) => Promise<T>): Promise<T>;
}
