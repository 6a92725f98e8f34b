import { Inject, Injectable, Logger } from '@nestjs/common';
import { OVERRIDE_STORE } from './override-import.constants';
import { CommitSummary, ImportRow } from './override-import.types';
import { OverrideStore } from './stores/override-store';
import { OverrideCommitError } from './override-commit.error';

/**
 * Applies previewed rows in a single transaction. Field errors are not
 * checked here; callers gate on the pipeline's canImport flag.
 */
@Injectable()
export class OverrideCommitService {
  private readonly logger = new Logger(OverrideCommitService.name);

  constructor(
    @Inject(OVERRIDE_STORE)
    private readonly store: OverrideStore,
  ) {}

  async commit(rows: readonly ImportRow[]): Promise<CommitSummary> {
    const summary = await this.store.transaction(async (trx) => {
      const counts: CommitSummary = { inserted: 0, updated: 0, deleted: 0 };
      for (const row of rows) {
        try {
          await this.apply(trx, row, counts);
        } catch (error) {
          throw new OverrideCommitError(row.csvRowNumber, row.action, error);
        }
      }
      return counts;
    });

    this.logger.log(
      `Committed overrides: ${summary.inserted} inserted, ${summary.updated} updated, ${summary.deleted} deleted`,
    );
    return summary;
  }

  private async apply(store: OverrideStore, row: ImportRow, counts: CommitSummary): Promise<void> {
    const { id, ...values } = row.override;

    switch (row.action) {
      case 'insert':
        await store.insert(values);
        counts.inserted++;
        return;
      case 'update':
        if (!id) throw new Error('No existing override to update');
        await store.update({ id, ...values });
        counts.updated++;
        return;
      case 'delete':
        if (!id) throw new Error('No existing override to delete');
        await store.delete(id);
        counts.deleted++;
        return;
      case 'skip':
        return;
    }
  }
}
