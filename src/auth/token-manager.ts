import Database from 'better-sqlite3';
import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto';
import { mkdirSync, unlinkSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';

/**
 * Encrypted storage for Schwab OAuth tokens.
 *
 * A single row in a SQLite file holds the token set, encrypted with
 * AES-256-GCM. Anything that fails to decrypt or parse loads as "no tokens":
 * the user just reconnects.
 */

/** Access tokens are treated as expired this long before they really are */
export const ACCESS_EXPIRY_BUFFER_MS = 5 * 60 * 1000;

const IV_BYTES = 12;
const TAG_BYTES = 16;
const ROW_ID = 'schwab';

export const tokenSetSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  expires_in: z.number().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
  id_token: z.string().optional(),
}).passthrough();

const storedTokensSchema = tokenSetSchema.extend({
  saved_at: z.string(),
  expires_at: z.string().optional(),
});

export type TokenSet = z.infer<typeof tokenSetSchema>;
export type StoredTokens = z.infer<typeof storedTokensSchema>;

const rowSchema = z.object({ payload: z.string() });

export interface TokenManagerOptions {
  now?: () => Date;
}

export class TokenManager {
  private db: Database.Database | null = null;
  private readonly key: Buffer;
  private readonly now: () => Date;

  constructor(
    encryptionKey: string,
    private readonly dbPath: string,
    options: TokenManagerOptions = {}
  ) {
    this.key = deriveKey(encryptionKey);
    this.now = options.now ?? (() => new Date());
  }

  /** Stamp and persist a token set, replacing whatever was stored */
  save(tokens: TokenSet): StoredTokens {
    const savedAt = this.now();
    const stored: StoredTokens = {
      ...tokens,
      saved_at: savedAt.toISOString(),
      expires_at: tokens.expires_in !== undefined
        ? new Date(savedAt.getTime() + tokens.expires_in * 1000).toISOString()
        : undefined,
    };

    this.getDb().prepare(`
      INSERT OR REPLACE INTO oauth_tokens (id, payload, updated_at)
      VALUES (?, ?, ?)
    `).run(ROW_ID, this.encrypt(JSON.stringify(stored)), stored.saved_at);

    return stored;
  }

  /** Stored tokens, or null when there are none or they cannot be read */
  load(): StoredTokens | null {
    const row = rowSchema.safeParse(
      this.getDb().prepare('SELECT payload FROM oauth_tokens WHERE id = ?').get(ROW_ID)
    );
    if (!row.success) return null;

    const plaintext = this.decrypt(row.data.payload);
    if (plaintext === null) return null;

    try {
      const parsed = storedTokensSchema.safeParse(JSON.parse(plaintext));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  /** Remove stored tokens; true if there were any */
  clear(): boolean {
    const result = this.getDb().prepare('DELETE FROM oauth_tokens WHERE id = ?').run(ROW_ID);
    return result.changes > 0;
  }

  /** True when there is no access token, no known expiry, or it expires within the buffer */
  isAccessExpired(): boolean {
    const tokens = this.load();
    if (!tokens?.expires_at) return true;
    const expiresAt = Date.parse(tokens.expires_at);
    if (Number.isNaN(expiresAt)) return true;
    return this.now().getTime() >= expiresAt - ACCESS_EXPIRY_BUFFER_MS;
  }

  isRefreshValid(): boolean {
    const tokens = this.load();
    return Boolean(tokens?.refresh_token);
  }

  hasValidTokens(): boolean {
    return !this.isAccessExpired() || this.isRefreshValid();
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private getDb(): Database.Database {
    if (this.db) return this.db;

    mkdirSync(dirname(this.dbPath), { recursive: true });
    try {
      this.db = openStore(this.dbPath);
    } catch {
      // Corrupt store: start over
      for (const suffix of ['', '-wal', '-shm']) {
        try { unlinkSync(this.dbPath + suffix); } catch { /* ignore */ }
      }
      this.db = openStore(this.dbPath);
    }
    return this.db;
  }

  /** base64(iv | auth tag | ciphertext) */
  private encrypt(plaintext: string): string {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv('aes-256-gcm', this.key, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]).toString('base64');
  }

  private decrypt(payload: string): string | null {
    const data = Buffer.from(payload, 'base64');
    if (data.length <= IV_BYTES + TAG_BYTES) return null;

    try {
      const decipher = createDecipheriv('aes-256-gcm', this.key, data.subarray(0, IV_BYTES));
      decipher.setAuthTag(data.subarray(IV_BYTES, IV_BYTES + TAG_BYTES));
      return Buffer.concat([
        decipher.update(data.subarray(IV_BYTES + TAG_BYTES)),
        decipher.final(),
      ]).toString('utf8');
    } catch {
      return null;
    }
  }
}

/**
 * A base64 key that decodes to exactly 32 bytes is used as-is;
 * any other string is hashed down to one.
 */
export function deriveKey(encryptionKey: string): Buffer {
  const decoded = Buffer.from(encryptionKey, 'base64');
  if (decoded.length === 32) return decoded;
  return createHash('sha256').update(encryptionKey).digest();
}

function openStore(path: string): Database.Database {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 3000');
  db.exec(`
    CREATE TABLE IF NOT EXISTS oauth_tokens (
      id TEXT PRIMARY KEY,
      payload TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);
  return db;
}
