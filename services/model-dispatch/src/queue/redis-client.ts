import { createClient } from 'redis';

export type RedisClient = ReturnType<typeof createClient>;
type RedisMulti = ReturnType<RedisClient['multi']>;

export interface ScoredMember {
  score: number;
  value: string;
}

/**
 * Queued writes applied atomically by exec().
 */
export interface RedisTransaction {
  set(key: string, value: string): RedisTransaction;
  del(key: string): RedisTransaction;
  lPush(key: string, element: string): RedisTransaction;
  rPush(key: string, element: string): RedisTransaction;
  lRem(key: string, count: number, element: string): RedisTransaction;
  sAdd(key: string, member: string): RedisTransaction;
  hSet(key: string, field: string, value: string): RedisTransaction;
  hDel(key: string, field: string): RedisTransaction;
  zAdd(key: string, member: ScoredMember): RedisTransaction;
  zRem(key: string, member: string): RedisTransaction;
  exec(): Promise<void>;
}

/**
 * The Redis commands the job queue and result store rely on.
 * List moves always pop from the right and push on the left.
 */
export interface RedisCommands {
  readonly isOpen: boolean;
  get(key: string): Promise<string | null>;
  /** Resolves false when `onlyIfAbsent` is set and the key already exists. */
  set(key: string, value: string, options?: { onlyIfAbsent?: boolean }): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  lMove(source: string, destination: string): Promise<string | null>;
  blMove(source: string, destination: string, timeoutSeconds: number): Promise<string | null>;
  lRem(key: string, count: number, element: string): Promise<number>;
  lLen(key: string): Promise<number>;
  lRange(key: string, start: number, stop: number): Promise<string[]>;
  sMembers(key: string): Promise<string[]>;
  hDel(key: string, field: string): Promise<number>;
  zAdd(key: string, member: ScoredMember, options?: { onlyIfAbsent?: boolean }): Promise<number>;
  zRem(key: string, member: string): Promise<number>;
  zScore(key: string, member: string): Promise<number | null>;
  zRangeByScore(key: string, min: number, max: number): Promise<string[]>;
  eval(script: string, options: { keys: string[]; arguments: string[] }): Promise<unknown>;
  multi(): RedisTransaction;
  /** A second connection for blocking commands, which hold their connection until they return. */
  openBlockingConnection(label: string): Promise<RedisCommands>;
  quit(): Promise<void>;
  disconnect(): Promise<void>;
}

class NodeRedisTransaction implements RedisTransaction {
  constructor(private readonly multi: RedisMulti) {}

  set(key: string, value: string): RedisTransaction {
    this.multi.set(key, value);
    return this;
  }

  del(key: string): RedisTransaction {
    this.multi.del(key);
    return this;
  }

  lPush(key: string, element: string): RedisTransaction {
    this.multi.lPush(key, element);
    return this;
  }

  rPush(key: string, element: string): RedisTransaction {
    this.multi.rPush(key, element);
    return this;
  }

  lRem(key: string, count: number, element: string): RedisTransaction {
    this.multi.lRem(key, count, element);
    return this;
  }

  sAdd(key: string, member: string): RedisTransaction {
    this.multi.sAdd(key, member);
    return this;
  }

  hSet(key: string, field: string, value: string): RedisTransaction {
    this.multi.hSet(key, field, value);
    return this;
  }

  hDel(key: string, field: string): RedisTransaction {
    this.multi.hDel(key, field);
    return this;
  }

  zAdd(key: string, member: ScoredMember): RedisTransaction {
    this.multi.zAdd(key, member);
    return this;
  }

  zRem(key: string, member: string): RedisTransaction {
    this.multi.zRem(key, member);
    return this;
  }

  async exec(): Promise<void> {
    await this.multi.exec();
  }
}

/**
 * RedisCommands over a node-redis client.
 */
export class NodeRedisCommands implements RedisCommands {
  constructor(private readonly client: RedisClient) {}

  get isOpen(): boolean {
    return this.client.isOpen;
  }

  get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, options: { onlyIfAbsent?: boolean } = {}): Promise<boolean> {
    const reply = options.onlyIfAbsent
      ? await this.client.set(key, value, { NX: true })
      : await this.client.set(key, value);
    return reply !== null;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(key)) === 1;
  }

  lMove(source: string, destination: string): Promise<string | null> {
    return this.client.lMove(source, destination, 'RIGHT', 'LEFT');
  }

  blMove(source: string, destination: string, timeoutSeconds: number): Promise<string | null> {
    return this.client.blMove(source, destination, 'RIGHT', 'LEFT', timeoutSeconds);
  }

  lRem(key: string, count: number, element: string): Promise<number> {
    return this.client.lRem(key, count, element);
  }

  lLen(key: string): Promise<number> {
    return this.client.lLen(key);
  }

  lRange(key: string, start: number, stop: number): Promise<string[]> {
    return this.client.lRange(key, start, stop);
  }

  sMembers(key: string): Promise<string[]> {
    return this.client.sMembers(key);
  }

  hDel(key: string, field: string): Promise<number> {
    return this.client.hDel(key, field);
  }

  zAdd(key: string, member: ScoredMember, options: { onlyIfAbsent?: boolean } = {}): Promise<number> {
    return options.onlyIfAbsent ? this.client.zAdd(key, member, { NX: true }) : this.client.zAdd(key, member);
  }

  zRem(key: string, member: string): Promise<number> {
    return this.client.zRem(key, member);
  }

  zScore(key: string, member: string): Promise<number | null> {
    return this.client.zScore(key, member);
  }

  zRangeByScore(key: string, min: number, max: number): Promise<string[]> {
    return this.client.zRangeByScore(key, min, max);
  }

  eval(script: string, options: { keys: string[]; arguments: string[] }): Promise<unknown> {
    return this.client.eval(script, options);
  }

  multi(): RedisTransaction {
    return new NodeRedisTransaction(this.client.multi());
  }

  async openBlockingConnection(label: string): Promise<RedisCommands> {
    const blocking = this.client.duplicate();
    blocking.on('error', (error) => console.error(`Redis blocking connection error (${label}):`, error));
    await blocking.connect();
    return new NodeRedisCommands(blocking);
  }

  async quit(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }

  async disconnect(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.disconnect();
    }
  }
}

export async function connectRedis(url: string): Promise<RedisCommands> {
  const client = createClient({ url });
  client.on('error', (error) => console.error('Redis connection error:', error));
  await client.connect();
  return new NodeRedisCommands(client);
}
