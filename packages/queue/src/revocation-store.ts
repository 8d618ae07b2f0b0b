import type { RevocationCheck } from "./job-processor.js";

export const REVOKED_KEY_PREFIX = "docboard:revoked:";

/** Longer than any job is kept around by the queues. */
export const DEFAULT_REVOCATION_TTL_SECONDS = 7 * 24 * 60 * 60;

/** The two Redis commands revocations need. */
export interface RevocationClient {
  set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
  exists(key: string): Promise<number>;
}

/**
 * Revoked task ids shared by producers and workers, one expiring Redis key
 * per id.
 */
export class RedisRevocationStore implements RevocationCheck {
  constructor(
    private readonly client: () => Promise<RevocationClient>,
    private readonly ttlSeconds: number = DEFAULT_REVOCATION_TTL_SECONDS,
  ) {}

  async markRevoked(taskId: string): Promise<void> {
    const client = await this.client();
    await client.set(`${REVOKED_KEY_PREFIX}${taskId}`, "1", "EX", this.ttlSeconds);
  }

  async isRevoked(taskId: string): Promise<boolean> {
    const client = await this.client();
    return (await client.exists(`${REVOKED_KEY_PREFIX}${taskId}`)) === 1;
  }
}
