import {
  TTweetv2Expansion,
  TTweetv2MediaField,
  TTweetv2TweetField,
  TTweetv2UserField,
  TweetV2,
  TwitterApi,
  TwitterV2IncludesHelper,
} from 'twitter-api-v2';
import { XApi, XCredentials, XListOptions, XTweet, XUser } from './x-api.interface';
import { toXApiError } from './x-api.errors';

const TWEET_FIELDS: TTweetv2TweetField[] = ['created_at', 'public_metrics', 'author_id', 'attachments'];
const EXPANSIONS: TTweetv2Expansion[] = ['author_id', 'attachments.media_keys'];
const MEDIA_FIELDS: TTweetv2MediaField[] = ['url', 'preview_image_url', 'type'];
const USER_FIELDS: TTweetv2UserField[] = ['username'];

// search/recent rejects max_results below 10
const MIN_PAGE = 10;
const MAX_PAGE = 100;

/** twitter-api-v2 behind the XApi port, one instance per authenticated account. */
export class XApiClient implements XApi {
  constructor(private readonly client: TwitterApi) {}

  static fromCredentials(credentials: XCredentials): XApiClient {
    return new XApiClient(
      new TwitterApi({
        appKey: credentials.appKey,
        appSecret: credentials.appSecret,
        accessToken: credentials.accessToken,
        accessSecret: credentials.accessSecret,
      }),
    );
  }

  me(): Promise<XUser> {
    return this.call(async () => {
      const { data } = await this.client.v2.me();
      return { id: data.id, username: data.username };
    });
  }

  userByUsername(username: string): Promise<XUser | null> {
    return this.call(async () => {
      const result = await this.client.v2.userByUsername(username);
      return result.data ? { id: result.data.id, username: result.data.username } : null;
    });
  }

  userTimeline(userId: string, options: XListOptions): Promise<XTweet[]> {
    return this.call(async () => {
      const page = await this.client.v2.userTimeline(userId, {
        ...this.listParams(options),
        exclude: ['replies', 'retweets'],
      });
      return this.toTweets(page.tweets, page.includes);
    });
  }

  searchRecent(query: string, options: XListOptions): Promise<XTweet[]> {
    return this.call(async () => {
      const page = await this.client.v2.search(query, this.listParams(options));
      return this.toTweets(page.tweets, page.includes);
    });
  }

  homeTimeline(options: XListOptions): Promise<XTweet[]> {
    return this.call(async () => {
      const page = await this.client.v2.homeTimeline(this.listParams(options));
      return this.toTweets(page.tweets, page.includes);
    });
  }

  like(userId: string, tweetId: string): Promise<void> {
    return this.call(async () => {
      await this.client.v2.like(userId, tweetId);
    });
  }

  retweet(userId: string, tweetId: string): Promise<void> {
    return this.call(async () => {
      await this.client.v2.retweet(userId, tweetId);
    });
  }

  reply(text: string, tweetId: string): Promise<void> {
    return this.call(async () => {
      await this.client.v2.reply(text, tweetId);
    });
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private async call<T>(work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw toXApiError(error);
    }
  }

  private listParams(options: XListOptions) {
    return {
      max_results: Math.min(MAX_PAGE, Math.max(MIN_PAGE, options.maxResults)),
      start_time: options.since?.toISOString(),
      'tweet.fields': TWEET_FIELDS,
      expansions: EXPANSIONS,
      'media.fields': MEDIA_FIELDS,
      'user.fields': USER_FIELDS,
    };
  }

  private toTweets(tweets: TweetV2[], includes: TwitterV2IncludesHelper): XTweet[] {
    return tweets.map((tweet) => {
      const metrics = tweet.public_metrics;
      const mediaUrls: string[] = [];
      for (const media of includes.medias(tweet)) {
        const url = media.url ?? media.preview_image_url;
        if (url) mediaUrls.push(url);
      }
      return {
        id: tweet.id,
        text: tweet.text,
        authorUsername: includes.author(tweet)?.username ?? tweet.author_id ?? '',
        createdAt: tweet.created_at ? new Date(tweet.created_at) : undefined,
        likeCount: metrics?.like_count ?? 0,
        retweetCount: metrics?.retweet_count ?? 0,
        replyCount: metrics?.reply_count ?? 0,
        impressionCount: metrics?.impression_count,
        mediaUrls,
      };
    });
  }
}
