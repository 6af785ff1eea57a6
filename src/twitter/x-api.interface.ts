/**
 * The slice of the X API v2 the engagement backends use, in the engine's
 * own shapes. `XApiClient` adapts twitter-api-v2 to it; specs fake it.
 */
export const X_API_FACTORY = 'X_API_FACTORY';

export interface XCredentials {
  readonly appKey: string;
  readonly appSecret: string;
  readonly accessToken: string;
  readonly accessSecret: string;
}

export interface XUser {
  readonly id: string;
  readonly username: string;
}

export interface XTweet {
  readonly id: string;
  readonly text: string;
  readonly authorUsername: string;
  readonly createdAt?: Date;
  readonly likeCount: number;
  readonly retweetCount: number;
  readonly replyCount: number;
  readonly impressionCount?: number;
  readonly mediaUrls: readonly string[];
}

export interface XListOptions {
  readonly since?: Date;
  readonly maxResults: number;
}

export interface XApi {
  me(): Promise<XUser>;
  /** Null when no such user exists. */
  userByUsername(username: string): Promise<XUser | null>;
  /** Original posts only: replies and retweets are excluded. */
  userTimeline(userId: string, options: XListOptions): Promise<XTweet[]>;
  searchRecent(query: string, options: XListOptions): Promise<XTweet[]>;
  homeTimeline(options: XListOptions): Promise<XTweet[]>;
  like(userId: string, tweetId: string): Promise<void>;
  retweet(userId: string, tweetId: string): Promise<void>;
  reply(text: string, tweetId: string): Promise<void>;
}

export type XApiFactory = (credentials: XCredentials) => XApi;
