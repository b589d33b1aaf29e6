import { randomUUID } from 'node:crypto';
import { EntityLink, FeedPost, FeedThread } from './types.js';
import { FeedError } from './errors.js';
import { extractEntityLinks, parseEntityLink, renderEntityLink } from './codec.js';
import { isSameEntity } from './link.js';

export interface CreateThreadInput {
  /** Entity link the thread is about, e.g. "<#E/table/db.orders/description>" */
  about: string;
  message: string;
  from: string;
  /** ISO timestamp, defaults to now (used when seeding) */
  createdAt?: string;
}

export interface AddPostInput {
  message: string;
  from: string;
  /** ISO timestamp, defaults to now */
  postedAt?: string;
}

export interface ListThreadsOptions {
  /** Only threads about this entity (any of its fields) */
  entityLink?: string;
  limit?: number;
}

/**
 * Number of threads about an entity, per link the threads were opened on
 */
export interface ThreadCounts {
  /** Canonical link of the entity */
  entityLink: string;
  total: number;
  counts: { entityLink: string; count: number }[];
}

export interface MentionQuery {
  qualifiedValue?: string;
  qualifiedType?: string;
}

export interface MentionResult {
  threadId: string;
  post: FeedPost;
  /** The mention that matched the query */
  link: EntityLink;
}

function requireText(value: string, what: string): string {
  if (!value.trim()) {
    throw new FeedError(`${what} must not be empty`);
  }
  return value;
}

/**
 * In-memory store of conversation threads about catalog entities.
 */
export class FeedStore {
  private readonly threads = new Map<string, FeedThread>();

  constructor(
    private readonly now: () => Date = () => new Date(),
    private readonly newId: () => string = randomUUID
  ) {}

  get size(): number {
    return this.threads.size;
  }

  private createPost(input: AddPostInput): FeedPost {
    const message = requireText(input.message, 'Message');
    return {
      id: this.newId(),
      from: requireText(input.from, 'Author'),
      message,
      postedAt: input.postedAt ?? this.now().toISOString(),
      mentions: extractEntityLinks(message)
    };
  }

  /**
   * Open a thread about an entity link with its first message
   */
  createThread(input: CreateThreadInput): FeedThread {
    const about = parseEntityLink(input.about);
    const createdAt = input.createdAt ?? this.now().toISOString();
    const opening = this.createPost({ message: input.message, from: input.from, postedAt: createdAt });

    const thread: FeedThread = {
      id: this.newId(),
      about,
      createdBy: opening.from,
      createdAt,
      posts: [opening]
    };
    this.threads.set(thread.id, thread);
    return thread;
  }

  addPost(threadId: string, input: AddPostInput): FeedPost {
    const thread = this.threads.get(threadId);
    if (!thread) {
      throw new FeedError(`Thread not found: ${threadId}`, 404);
    }
    const post = this.createPost(input);
    thread.posts.push(post);
    return post;
  }

  getThread(threadId: string): FeedThread | undefined {
    return this.threads.get(threadId);
  }

  /**
   * Threads newest first, optionally only those about one entity
   */
  listThreads(options: ListThreadsOptions = {}): FeedThread[] {
    // Reverse first so that equal timestamps keep the latest insert on top
    let threads = Array.from(this.threads.values()).reverse();

    if (options.entityLink !== undefined) {
      const target = parseEntityLink(options.entityLink);
      threads = threads.filter(t => isSameEntity(t.about, target));
    }

    threads.sort((a, b) => b.createdAt.localeCompare(a.createdAt));

    if (options.limit !== undefined && options.limit > 0 && threads.length > options.limit) {
      return threads.slice(0, options.limit);
    }
    return threads;
  }

  /**
   * Count threads about an entity, grouped by the exact link each was opened on
   */
  threadCounts(entityLink: string): ThreadCounts {
    const target = parseEntityLink(entityLink);
    const counts = new Map<string, number>();
    let total = 0;

    for (const thread of this.threads.values()) {
      if (!isSameEntity(thread.about, target)) {
        continue;
      }
      const key = renderEntityLink(thread.about);
      counts.set(key, (counts.get(key) ?? 0) + 1);
      total++;
    }

    return {
      entityLink: renderEntityLink(target),
      total,
      counts: Array.from(counts, ([link, count]) => ({ entityLink: link, count }))
    };
  }

  /**
   * Posts mentioning a qualified value, a qualified type, or both
   */
  findMentions(query: MentionQuery): MentionResult[] {
    const { qualifiedValue, qualifiedType } = query;
    if (!qualifiedValue && !qualifiedType) {
      throw new FeedError('Either qualifiedValue or qualifiedType is required');
    }

    const results: MentionResult[] = [];
    for (const thread of this.threads.values()) {
      for (const post of thread.posts) {
        const link = post.mentions.find(m =>
          (!qualifiedValue || m.qualifiedValue === qualifiedValue)
          && (!qualifiedType || m.qualifiedType === qualifiedType)
        );
        if (link) {
          results.push({ threadId: thread.id, post, link });
        }
      }
    }
    return results;
  }
}
