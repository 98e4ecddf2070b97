/**
 * Catalog Collaborator
 *
 * Copies are created by catalog management, outside the circulation core.
 * The circulation engine only asks whether a copy exists and which book it
 * belongs to; both answers come from the Resource Ledger's read path.
 */

import type { IResourceLedger } from '../repositories/index.js';

export interface CatalogDirectory {
  copyExists(copyId: string): Promise<boolean>;
  bookOf(copyId: string): Promise<string | null>;
}

export class LedgerCatalogDirectory implements CatalogDirectory {
  constructor(private readonly copies: IResourceLedger) {}

  async copyExists(copyId: string): Promise<boolean> {
    return (await this.copies.getCopy(copyId)) !== null;
  }

  async bookOf(copyId: string): Promise<string | null> {
    const copy = await this.copies.getCopy(copyId);
    return copy?.bookId ?? null;
  }
}
