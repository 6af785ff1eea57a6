import { Injectable } from '@nestjs/common';
import { ActionKind } from '../engagement.types';
import { DedupStore } from '../interfaces/collaborators.interface';

/** Process-local store for the `memory` storage driver and tests. */
@Injectable()
export class InMemoryDedupStore implements DedupStore {
  private readonly records = new Map<string, Date>();

  async hasActed(accountId: string, contentId: string, actionKind: ActionKind): Promise<boolean> {
    return this.records.has(this.keyFor(accountId, actionKind, contentId));
  }

  async recordAction(
    accountId: string,
    contentId: string,
    actionKind: ActionKind,
    at: Date,
  ): Promise<boolean> {
    const key = this.keyFor(accountId, actionKind, contentId);
    // check and set run in the same tick
    if (this.records.has(key)) {
      return false;
    }
    this.records.set(key, at);
    return true;
  }

  private keyFor(accountId: string, actionKind: ActionKind, contentId: string): string {
    return `${accountId}:${actionKind}:${contentId}`;
  }
}
