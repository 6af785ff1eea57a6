export const ENGAGEMENT_QUEUE = 'engagement-queue';
export const ENGAGEMENT_RUN_JOB = 'engagement-run';

export interface EngagementRunJob {
  /** Runs only this account when set. */
  readonly accountId?: string;
  /** Schedule slot the job was created for, e.g. 202603011200. */
  readonly slot: string;
}
