/**
 * @kitty-wallet/keystore — Keystore.
 *
 * Maps public keys to signing capability. Key records live in a
 * KeyValueStore under `key/<publicKey>`; a record holds either the raw
 * ed25519 seed or the seed wrapped with scrypt + AES-256-GCM.
 *
 * Wrapped keys sign only after unlock(); the unwrapped key is cached in
 * memory until lock() or the keystore is dropped.
 */

import {
  createCipheriv,
  createDecipheriv,
  createHash,
  randomBytes,
  scryptSync,
} from "node:crypto";
import type { KeyObject } from "node:crypto";
import { z } from "zod";
import type { KeyValueStore } from "@kitty-wallet/store";
import { StoreError } from "@kitty-wallet/store";
import type { JsonValue, PublicKey } from "@kitty-wallet/types";
import {
  privateKeyFromSeed,
  publicKeyOf,
  SEED_LENGTH,
  signPayload,
} from "./ed25519.js";
import type { WalletKeyInfo } from "./types.js";
import { KeystoreError } from "./types.js";

// =============================================================================
// Records
// =============================================================================

const KEY_PREFIX = "key/";

const hex = (bytes: number) => z.string().regex(new RegExp(`^[0-9a-f]{${bytes * 2}}$`));

const KeyRecordSchema = z.discriminatedUnion("encrypted", [
  z.object({
    encrypted: z.literal(false),
    publicKey: hex(32),
    createdAt: z.string(),
    seed: hex(SEED_LENGTH),
  }),
  z.object({
    encrypted: z.literal(true),
    publicKey: hex(32),
    createdAt: z.string(),
    ciphertext: hex(SEED_LENGTH),
    salt: hex(16),
    iv: hex(12),
    tag: hex(16),
  }),
]);

type KeyRecord = z.infer<typeof KeyRecordSchema>;

/** scrypt cost; N=2^14 keeps unlock well under a second */
const SCRYPT_OPTIONS = { N: 1 << 14, r: 8, p: 1 } as const;

function deriveWrappingKey(password: string, salt: Buffer): Buffer {
  return scryptSync(password, salt, 32, SCRYPT_OPTIONS);
}

function wrapSeed(
  seed: Buffer,
  password: string,
): { ciphertext: string; salt: string; iv: string; tag: string } {
  const salt = randomBytes(16);
  const iv = randomBytes(12);
  const cipher = createCipheriv("aes-256-gcm", deriveWrappingKey(password, salt), iv);
  const ciphertext = Buffer.concat([cipher.update(seed), cipher.final()]);
  return {
    ciphertext: ciphertext.toString("hex"),
    salt: salt.toString("hex"),
    iv: iv.toString("hex"),
    tag: cipher.getAuthTag().toString("hex"),
  };
}

// =============================================================================
// Keystore
// =============================================================================

export interface KeystoreOptions {
  /** Clock for createdAt stamps */
  readonly now?: () => Date;
}

export class Keystore {
  private readonly _unlocked = new Map<PublicKey, KeyObject>();
  private readonly _now: () => Date;

  constructor(
    private readonly kv: KeyValueStore,
    options: KeystoreOptions = {},
  ) {
    this._now = options.now ?? (() => new Date());
  }

  // ─── Key management ─────────────────────────────────────────────────

  /**
   * Create a key from fresh randomness.
   *
   * With a password the seed is stored wrapped and the key stays locked
   * until unlock().
   */
  generate(password?: string): PublicKey {
    return this._store(randomBytes(SEED_LENGTH), password);
  }

  /**
   * Import a key from a seed phrase. The same phrase always yields the
   * same key; importing it twice keeps the first record.
   *
   * @throws KeystoreError INVALID_SEED for an empty phrase
   */
  insert(seed: string, password?: string): PublicKey {
    if (seed.trim().length === 0) {
      throw new KeystoreError("INVALID_SEED", "Seed phrase must not be empty");
    }
    const material = createHash("sha256").update(seed, "utf-8").digest();
    return this._store(material, password);
  }

  /**
   * Delete a key irrevocably.
   *
   * @throws KeystoreError KEY_NOT_FOUND
   */
  remove(publicKey: PublicKey): void {
    this._requireRecord(publicKey);
    this.kv.batch([{ type: "delete", key: KEY_PREFIX + publicKey }]);
    this._unlocked.delete(publicKey);
  }

  /** Public keys held, ascending. */
  list(): readonly PublicKey[] {
    return this.kv.entries(KEY_PREFIX).map(([key]) => key.slice(KEY_PREFIX.length));
  }

  has(publicKey: PublicKey): boolean {
    return this.kv.has(KEY_PREFIX + publicKey);
  }

  info(publicKey: PublicKey): WalletKeyInfo {
    const record = this._requireRecord(publicKey);
    return {
      publicKey: record.publicKey,
      encrypted: record.encrypted,
      createdAt: record.createdAt,
    };
  }

  // ─── Locking ────────────────────────────────────────────────────────

  /**
   * Unwrap a password-protected key and keep it in memory.
   * Unlocking a key stored in the clear is a no-op.
   *
   * @throws KeystoreError KEY_NOT_FOUND | WRONG_PASSWORD
   */
  unlock(publicKey: PublicKey, password: string): void {
    const record = this._requireRecord(publicKey);
    if (!record.encrypted) {
      return;
    }

    const decipher = createDecipheriv(
      "aes-256-gcm",
      deriveWrappingKey(password, Buffer.from(record.salt, "hex")),
      Buffer.from(record.iv, "hex"),
    );
    decipher.setAuthTag(Buffer.from(record.tag, "hex"));

    let seed: Buffer;
    try {
      seed = Buffer.concat([
        decipher.update(Buffer.from(record.ciphertext, "hex")),
        decipher.final(),
      ]);
    } catch {
      throw new KeystoreError(
        "WRONG_PASSWORD",
        `Wrong password for key ${publicKey}`,
        publicKey,
      );
    }

    this._unlocked.set(publicKey, privateKeyFromSeed(seed));
  }

  lock(publicKey: PublicKey): void {
    this._unlocked.delete(publicKey);
  }

  isUnlocked(publicKey: PublicKey): boolean {
    const record = this._readRecord(publicKey);
    if (record === undefined) {
      return false;
    }
    return !record.encrypted || this._unlocked.has(publicKey);
  }

  // ─── Signing ────────────────────────────────────────────────────────

  /**
   * Sign a payload with the key's private half.
   *
   * @returns Hex-encoded 64-byte signature
   * @throws KeystoreError KEY_NOT_FOUND | LOCKED_OR_PASSWORD_REQUIRED
   */
  sign(publicKey: PublicKey, payload: Uint8Array): string {
    const record = this._requireRecord(publicKey);
    if (!record.encrypted) {
      return signPayload(privateKeyFromSeed(Buffer.from(record.seed, "hex")), payload);
    }

    const unlocked = this._unlocked.get(publicKey);
    if (unlocked === undefined) {
      throw new KeystoreError(
        "LOCKED_OR_PASSWORD_REQUIRED",
        `Key ${publicKey} is password protected; unlock it first`,
        publicKey,
      );
    }
    return signPayload(unlocked, payload);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _store(seed: Buffer, password: string | undefined): PublicKey {
    const privateKey = privateKeyFromSeed(seed);
    const publicKey = publicKeyOf(privateKey);
    if (this.has(publicKey)) {
      return publicKey;
    }

    const createdAt = this._now().toISOString();
    const record: JsonValue =
      password === undefined
        ? { encrypted: false, publicKey, createdAt, seed: seed.toString("hex") }
        : { encrypted: true, publicKey, createdAt, ...wrapSeed(seed, password) };

    this.kv.batch([{ type: "put", key: KEY_PREFIX + publicKey, value: record }]);
    return publicKey;
  }

  private _readRecord(publicKey: PublicKey): KeyRecord | undefined {
    const key = KEY_PREFIX + publicKey;
    const value = this.kv.get(key);
    if (value === undefined) {
      return undefined;
    }
    const parsed = KeyRecordSchema.safeParse(value);
    if (!parsed.success) {
      throw new StoreError(
        "STORE_CORRUPTED",
        `Unreadable key record "${key}": ${parsed.error.issues[0]?.message ?? "invalid"}`,
        key,
      );
    }
    return parsed.data;
  }

  private _requireRecord(publicKey: PublicKey): KeyRecord {
    const record = this._readRecord(publicKey);
    if (record === undefined) {
      throw new KeystoreError("KEY_NOT_FOUND", `No key ${publicKey} in keystore`, publicKey);
    }
    return record;
  }
}
