import pino, { type Logger } from "pino";
import { z } from "zod";
import { RepositoryIdSchema } from "@runnerctl/shared/lib/identifiers";
import { detectGithubToken, isPlausibleTokenText } from "@runnerctl/shared/lib/token-patterns";
import { AuthError, CorruptRecordError, NotFoundError, ValidationError } from "../errors.js";
import { Mutex } from "../runtime/concurrency.js";
import { describeLoosePermissions, ensurePrivateDir, PRIVATE_FILE_MODE } from "../storage/fs-private.js";
import { readTextIfExists, removeIfExists, writeJsonFileAtomic } from "../storage/fs-safe.js";
import { deriveKeystream, generateSalt } from "./kdf.js";
import {
  createPasswordVerifier,
  PasswordVerifierSchema,
  verifyPassword,
  type PasswordVerifier,
  type VerifierParams,
} from "./password-verifier.js";
import { decodeToken, encodeToken } from "./xor-codec.js";

export const CredentialRecordSchema = z.object({
  cipherText: z.string().min(1),
  salt: z.string().min(1),
  verifierId: z.string().min(1),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type CredentialRecord = z.infer<typeof CredentialRecordSchema>;

const RecordsFileSchema = z.object({
  version: z.literal(1),
  records: z.record(z.string(), CredentialRecordSchema),
});

type RecordsFile = z.infer<typeof RecordsFileSchema>;

// `previous` is only present while a password change is in flight: the records
// may still be under it until tokens.json has been replaced.
const VerifierFileSchema = z.object({
  current: PasswordVerifierSchema,
  previous: PasswordVerifierSchema.optional(),
});

type VerifierFile = z.infer<typeof VerifierFileSchema>;

export type VaultPaths = {
  vaultDir: string;
  recordsPath: string;
  verifierPath: string;
};

export type VaultStatus = {
  exists: boolean;
  recordCount: number;
  hasVerifier: boolean;
  warnings: string[];
};

// Every CredentialStore in the process funnels writes through this lock, so
// two stores pointed at the same vault cannot interleave read-modify-write.
const vaultWriteLock = new Mutex();

function parseJsonFile<T>(raw: string, schema: z.ZodType<T>, subject: string, filePath: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CorruptRecordError(subject, `vault file is not valid JSON: ${filePath}`, err);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new CorruptRecordError(subject, `vault file is malformed${where}: ${filePath}`, result.error);
  }
  return result.data;
}

async function matchVerifier(verifiers: VerifierFile, password: string): Promise<PasswordVerifier | null> {
  if (await verifyPassword(verifiers.current, password)) return verifiers.current;
  if (verifiers.previous && (await verifyPassword(verifiers.previous, password))) return verifiers.previous;
  return null;
}

function parseRepository(repository: string): string {
  const result = RepositoryIdSchema.safeParse(repository);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? "invalid repository", repository);
  }
  return result.data;
}

/**
 * Password-encrypted GitHub tokens keyed by repository.
 *
 * One password protects the whole vault; its scrypt verifier lives next to the
 * records and each record remembers which verifier it was written under.
 */
export class CredentialStore {
  private readonly paths: VaultPaths;
  private readonly logger: Logger;
  private readonly verifierParams?: VerifierParams;

  constructor(params: { paths: VaultPaths; logger?: Logger; verifierParams?: VerifierParams }) {
    this.paths = params.paths;
    this.logger = params.logger ?? pino({ level: "silent" });
    this.verifierParams = params.verifierParams;
  }

  async save(repository: string, token: string, password: string): Promise<void> {
    const repo = parseRepository(repository);
    if (!password) throw new ValidationError("password must not be empty", repo);
    if (!isPlausibleTokenText(token)) {
      throw new ValidationError("token must be non-empty printable ASCII without whitespace", repo);
    }
    if (!detectGithubToken(token)) {
      this.logger.warn({ repository: repo }, "token does not match a known GitHub token prefix; saving anyway");
    }

    await vaultWriteLock.runExclusive(async () => {
      const file = await this.readRecords();
      const existing = Object.entries(file.records).filter(([key]) => key !== repo);
      const verifiers = await this.readVerifiers();
      let verifier: PasswordVerifier;
      let replaced: PasswordVerifier | null = null;

      if (existing.length > 0) {
        if (!verifiers) {
          throw new CorruptRecordError(repo, `vault has records but no password verifier: ${this.paths.verifierPath}`);
        }
        const matched = await matchVerifier(verifiers, password);
        if (!matched || existing.some(([, record]) => record.verifierId !== matched.id)) {
          throw new AuthError(repo, `password does not match the vault password (saving ${repo})`, "use `runnerctl credentials rekey` to change the vault password");
        }
        verifier = matched;
      } else {
        const matched = verifiers ? await matchVerifier(verifiers, password) : null;
        if (matched) {
          verifier = matched;
        } else {
          replaced = verifiers?.current ?? null;
          verifier = await createPasswordVerifier(password, this.verifierParams);
        }
      }

      const now = new Date().toISOString();
      const previous = file.records[repo];
      file.records[repo] = {
        ...this.encrypt(token, password, verifier.id),
        createdAt: previous?.createdAt ?? now,
        updatedAt: now,
      };

      await ensurePrivateDir(this.paths.vaultDir);
      const settled = verifiers !== null && verifiers.current.id === verifier.id && !verifiers.previous;
      const staged: VerifierFile = replaced ? { current: verifier, previous: replaced } : { current: verifier };
      await this.commitRecords(file, settled ? null : staged);
      this.logger.info({ repository: repo, updated: Boolean(previous) }, "token saved");
    });
  }

  async load(repository: string, password: string): Promise<string> {
    const repo = parseRepository(repository);
    const file = await this.readRecords();
    const record = file.records[repo];
    if (!record) {
      throw new NotFoundError(repo, `no token stored for ${repo}`, `run: runnerctl credentials save ${repo}`);
    }
    const verifier = await this.requireVerifier(repo, password);
    if (record.verifierId !== verifier.id) {
      throw new CorruptRecordError(repo, `record for ${repo} was written under a different vault password`);
    }

    const token = this.decrypt(record, password);
    if (!isPlausibleTokenText(token)) {
      throw new CorruptRecordError(repo, `record for ${repo} did not decode to a token`);
    }
    return token;
  }

  async list(password: string): Promise<string[]> {
    const file = await this.readRecords();
    const repositories = Object.keys(file.records).sort((a, b) => a.localeCompare(b));
    if (repositories.length === 0) return [];
    await this.requireVerifier("vault", password);
    return repositories;
  }

  async clearOne(repository: string): Promise<void> {
    const repo = parseRepository(repository);
    await vaultWriteLock.runExclusive(async () => {
      const file = await this.readRecords();
      if (!file.records[repo]) {
        throw new NotFoundError(repo, `no token stored for ${repo}`);
      }
      delete file.records[repo];
      if (Object.keys(file.records).length === 0) {
        await this.removeVaultFiles();
      } else {
        await writeJsonFileAtomic(this.paths.recordsPath, file, { mode: PRIVATE_FILE_MODE });
      }
      this.logger.info({ repository: repo }, "token cleared");
    });
  }

  async clearAll(): Promise<number> {
    return await vaultWriteLock.runExclusive(async () => {
      const file = await this.readRecords();
      const count = Object.keys(file.records).length;
      await this.removeVaultFiles();
      this.logger.info({ count }, "vault cleared");
      return count;
    });
  }

  async rekey(oldPassword: string, newPassword: string): Promise<number> {
    if (!newPassword) throw new ValidationError("new password must not be empty");
    return await vaultWriteLock.runExclusive(async () => {
      const file = await this.readRecords();
      const entries = Object.entries(file.records);
      if (entries.length === 0) {
        throw new NotFoundError("vault", "vault is empty; nothing to rekey", "save a token first");
      }
      const current = await this.requireVerifier("vault", oldPassword);
      const next = await createPasswordVerifier(newPassword, this.verifierParams);
      const now = new Date().toISOString();

      const records: RecordsFile["records"] = {};
      for (const [repo, record] of entries) {
        if (record.verifierId !== current.id) {
          throw new CorruptRecordError(repo, `record for ${repo} was written under a different vault password`);
        }
        const token = this.decrypt(record, oldPassword);
        if (!isPlausibleTokenText(token)) {
          throw new CorruptRecordError(repo, `record for ${repo} did not decode to a token`);
        }
        records[repo] = { ...this.encrypt(token, newPassword, next.id), createdAt: record.createdAt, updatedAt: now };
      }

      await ensurePrivateDir(this.paths.vaultDir);
      await this.commitRecords({ version: 1, records }, { current: next, previous: current });
      this.logger.info({ count: entries.length }, "vault rekeyed");
      return entries.length;
    });
  }

  async status(): Promise<VaultStatus> {
    const rawRecords = await readTextIfExists(this.paths.recordsPath);
    const rawVerifier = await readTextIfExists(this.paths.verifierPath);
    const warnings: string[] = [];
    let recordCount = 0;
    if (rawRecords !== null) {
      recordCount = Object.keys(parseJsonFile(rawRecords, RecordsFileSchema, "vault", this.paths.recordsPath).records).length;
      const loose = await describeLoosePermissions(this.paths.recordsPath);
      if (loose) warnings.push(loose);
    }
    if (rawVerifier !== null) {
      const loose = await describeLoosePermissions(this.paths.verifierPath);
      if (loose) warnings.push(loose);
    }
    if (recordCount > 0 && rawVerifier === null) warnings.push("vault has records but no password verifier");
    if (rawVerifier !== null && parseJsonFile(rawVerifier, VerifierFileSchema, "vault", this.paths.verifierPath).previous) {
      warnings.push("a password change was interrupted; rerun `runnerctl credentials rekey`");
    }
    return {
      exists: rawRecords !== null || rawVerifier !== null,
      recordCount,
      hasVerifier: rawVerifier !== null,
      warnings,
    };
  }

  private encrypt(token: string, password: string, verifierId: string): Pick<CredentialRecord, "cipherText" | "salt" | "verifierId"> {
    const payload = Buffer.from(token, "utf8");
    const salt = generateSalt();
    const keystream = deriveKeystream(password, salt, payload.length);
    const cipher = encodeToken(payload, keystream);
    payload.fill(0);
    keystream.fill(0);
    return { cipherText: cipher.toString("base64url"), salt: salt.toString("base64url"), verifierId };
  }

  private decrypt(record: CredentialRecord, password: string): string {
    const cipher = Buffer.from(record.cipherText, "base64url");
    const keystream = deriveKeystream(password, Buffer.from(record.salt, "base64url"), cipher.length);
    const plain = decodeToken(cipher, keystream);
    keystream.fill(0);
    const token = plain.toString("utf8");
    plain.fill(0);
    return token;
  }

  private async readRecords(): Promise<RecordsFile> {
    const raw = await readTextIfExists(this.paths.recordsPath);
    if (raw === null) return { version: 1, records: {} };
    return parseJsonFile(raw, RecordsFileSchema, "vault", this.paths.recordsPath);
  }

  private async readVerifiers(): Promise<VerifierFile | null> {
    const raw = await readTextIfExists(this.paths.verifierPath);
    if (raw === null) return null;
    return parseJsonFile(raw, VerifierFileSchema, "vault", this.paths.verifierPath);
  }

  private async requireVerifier(subject: string, password: string): Promise<PasswordVerifier> {
    const verifiers = await this.readVerifiers();
    if (!verifiers) {
      throw new CorruptRecordError(subject, `vault has records but no password verifier: ${this.paths.verifierPath}`);
    }
    const verifier = await matchVerifier(verifiers, password);
    if (!verifier) throw new AuthError(subject);
    return verifier;
  }

  /**
   * Replaces tokens.json. With `staged`, verifier.json first names both the
   * new and the old verifier, and drops the old one once the records are in.
   */
  private async commitRecords(file: RecordsFile, staged: VerifierFile | null): Promise<void> {
    if (staged) await writeJsonFileAtomic(this.paths.verifierPath, staged, { mode: PRIVATE_FILE_MODE });
    await writeJsonFileAtomic(this.paths.recordsPath, file, { mode: PRIVATE_FILE_MODE });
    if (staged?.previous) {
      await writeJsonFileAtomic(this.paths.verifierPath, { current: staged.current }, { mode: PRIVATE_FILE_MODE });
    }
  }

  private async removeVaultFiles(): Promise<void> {
    await removeIfExists(this.paths.recordsPath);
    await removeIfExists(this.paths.verifierPath);
  }
}
