import { SessionHandle } from '@/engagement/interfaces/collaborators.interface';
import { XApi, XUser } from './x-api.interface';

/** An authenticated X account. Holds the user id lookups made during the run. */
export class TwitterSession implements SessionHandle {
  private readonly userIds = new Map<string, string | null>();
  released = false;

  constructor(
    readonly accountId: string,
    readonly user: XUser,
    readonly api: XApi,
  ) {}

  get handle(): string {
    return this.user.username.toLowerCase();
  }

  /** Resolves a handle to a user id once per session; null when no such user exists. */
  async resolveUserId(handle: string): Promise<string | null> {
    const key = handle.toLowerCase();
    const cached = this.userIds.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const user = await this.api.userByUsername(key);
    const id = user?.id ?? null;
    this.userIds.set(key, id);
    return id;
  }
}

/** The live TwitterSession behind a handle, or null for a foreign or released one. */
export function liveTwitterSession(session: SessionHandle): TwitterSession | null {
  return session instanceof TwitterSession && !session.released ? session : null;
}
