import fs from 'fs-extra';
import { FeedStore } from './feed.js';

/**
 * Options for seeding the feed
 */
export interface LoadOptions {
  /** JSON file holding an array of seed threads */
  seedFile: string;
  /** Store to add threads to (default: a new store) */
  store?: FeedStore;
}

/**
 * Result of seeding the feed
 */
export interface LoadResult {
  store: FeedStore;
  /** Number of threads added */
  loaded: number;
  /** Problems with individual entries; those entries are skipped */
  errors: string[];
}

interface SeedPost {
  from: string;
  message: string;
  postedAt?: string;
}

interface SeedThread {
  about: string;
  createdAt?: string;
  posts: SeedPost[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSeedPost(value: unknown): SeedPost | null {
  if (!isRecord(value) || typeof value.from !== 'string' || typeof value.message !== 'string') {
    return null;
  }
  if (!value.from.trim() || !value.message.trim()) {
    return null;
  }
  const post: SeedPost = { from: value.from, message: value.message };
  if (typeof value.postedAt === 'string') {
    post.postedAt = value.postedAt;
  }
  return post;
}

/**
 * Check the shape of one seed entry, returning a reason when it is unusable
 */
function toSeedThread(value: unknown): SeedThread | string {
  if (!isRecord(value)) {
    return 'entry is not an object';
  }
  if (typeof value.about !== 'string') {
    return 'missing "about" link';
  }
  if (!Array.isArray(value.posts) || value.posts.length === 0) {
    return 'missing "posts"';
  }
  const posts: SeedPost[] = [];
  for (const raw of value.posts) {
    const post = toSeedPost(raw);
    if (!post) {
      return 'every post needs a non-empty "from" and "message"';
    }
    posts.push(post);
  }
  const thread: SeedThread = { about: value.about, posts };
  if (typeof value.createdAt === 'string') {
    thread.createdAt = value.createdAt;
  }
  return thread;
}

/**
 * Load seed threads from a JSON file into a feed store
 */
export async function loadSeedThreads(options: LoadOptions): Promise<LoadResult> {
  const store = options.store ?? new FeedStore();
  const errors: string[] = [];
  let loaded = 0;

  let raw: unknown;
  try {
    raw = await fs.readJson(options.seedFile);
  } catch (err) {
    return { store, loaded, errors: [`Failed to read ${options.seedFile}: ${err instanceof Error ? err.message : String(err)}`] };
  }
  if (!Array.isArray(raw)) {
    return { store, loaded, errors: [`${options.seedFile}: expected an array of threads`] };
  }

  raw.forEach((entry: unknown, i: number) => {
    const seed = toSeedThread(entry);
    if (typeof seed === 'string') {
      errors.push(`Thread ${i}: ${seed}`);
      return;
    }

    const [opening, ...replies] = seed.posts;
    try {
      const thread = store.createThread({
        about: seed.about,
        message: opening.message,
        from: opening.from,
        createdAt: seed.createdAt ?? opening.postedAt
      });
      for (const reply of replies) {
        store.addPost(thread.id, reply);
      }
      loaded++;
    } catch (err) {
      errors.push(`Thread ${i}: ${err instanceof Error ? err.message : String(err)}`);
    }
  });

  return { store, loaded, errors };
}
