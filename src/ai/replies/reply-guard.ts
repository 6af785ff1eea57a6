import { Candidate } from '@/engagement/engagement.types';
import { ReplyDraftDto } from '../dto/model-output.dto';
import {
  describeMedia,
  extractKeywords,
  inferTone,
  isProbablyHumorous,
  tokenizeForOverlap,
} from '../text/text-analysis';

/** Drafts are cut below X's own limit. */
export const REPLY_TARGET_CHARS = 270;
const POST_KEYWORDS = 6;

export interface PostContext {
  readonly text: string;
  readonly author: string;
  readonly keywords: readonly string[];
  readonly mediaNote: string;
  readonly descriptor: string;
}

export function describePost(candidate: Candidate): PostContext {
  const text = candidate.text.trim();
  const mediaUrls = candidate.mediaUrls ?? [];

  const descriptor = [`Tone: ${inferTone([text])}.`];
  if (isProbablyHumorous(text)) {
    descriptor.push('Humorous or meme-like language detected.');
  }
  if (text.includes('?')) {
    descriptor.push('This post asks a question; answer it directly.');
  }
  if (!text && mediaUrls.length > 0) {
    descriptor.push('The post has no caption; rely on the media or say you cannot see it.');
  }

  return {
    text,
    author: candidate.authorId,
    keywords: extractKeywords([text], POST_KEYWORDS),
    mediaNote: describeMedia(mediaUrls),
    descriptor: descriptor.join(' '),
  };
}

/** Off-topic terms the reply uses that neither the post nor the allowed terms mention. */
export function findOffTopicTerms(
  reply: string,
  post: string,
  offTopicTerms: readonly string[],
  allowedTerms: readonly string[],
): string[] {
  const lowered = reply.toLowerCase();
  const allowed = tokenizeForOverlap(post);
  for (const term of allowedTerms) {
    allowed.add(term.toLowerCase());
  }
  return offTopicTerms.filter((term) => {
    const needle = term.toLowerCase();
    return lowered.includes(needle) && !allowed.has(needle);
  });
}

export type ReplyCheck = { readonly accepted: string } | { readonly rejected: string };

/** Trims the draft to the length cap, then accepts it or says why not. */
export function checkDraft(
  draft: ReplyDraftDto,
  post: PostContext,
  offTopicTerms: readonly string[],
  allowedTerms: readonly string[],
): ReplyCheck {
  const text = Array.from(draft.reply_text.trim()).slice(0, REPLY_TARGET_CHARS).join('').trimEnd();
  if (!text) {
    return { rejected: 'No reply text returned.' };
  }
  if (!draft.is_relevant) {
    return { rejected: draft.relevance_reason?.trim() || 'Model flagged reply as not relevant.' };
  }
  const flagged = findOffTopicTerms(text, post.text, offTopicTerms, [
    ...post.keywords,
    ...allowedTerms,
  ]);
  if (flagged.length > 0) {
    return { rejected: `Reply referenced off-topic terms: ${flagged.join(', ')}.` };
  }
  return { accepted: text };
}

export function buildReplyPrompt(
  post: PostContext,
  offTopicTerms: readonly string[],
  feedback?: string,
): string {
  const lines = [
    'You are writing a public reply on X.',
    "Keep the reply tightly focused on the post's content.",
    `Allowed length: at most ${REPLY_TARGET_CHARS} characters.`,
    'Do not invent details about attached media; if unsure, say so briefly.',
    'Use a neutral, conversational tone.',
  ];
  if (feedback) {
    lines.push(`Correction guidance: ${feedback}`);
  }
  lines.push('');
  lines.push(
    post.keywords.length > 0
      ? `Prioritise these post keywords: ${post.keywords.join(', ')}.`
      : 'Focus on what the post explicitly states.',
  );
  if (offTopicTerms.length > 0) {
    lines.push(`Avoid these terms unless the post mentions them: ${offTopicTerms.join(', ')}.`);
  }
  lines.push(
    '',
    'Post details:',
    `- Author handle: @${post.author || 'user'}`,
    `- Post text: ${post.text || '[no text supplied]'}`,
    `- Media note: ${post.mediaNote}`,
    `- Descriptor: ${post.descriptor}`,
    '',
    'Respond with a JSON object: {"reply_text": string, "is_relevant": boolean, ' +
      '"relevance_reason": string, "referenced_topics": string[] (0-4 items)}.',
    "Set is_relevant to false if the reply does not address the post's subject, and explain why in relevance_reason.",
  );
  return lines.join('\n');
}
