import { NotFoundError } from "@runnerctl/core/lib/errors";
import type { TokenSource } from "@runnerctl/core/lib/runners/lifecycle";
import type { CredentialStore } from "@runnerctl/core/lib/vault/credential-store";
import { createCredentialStore, type BaseContext } from "../../lib/context.js";
import { readVaultPassword } from "../../lib/prompt.js";

/**
 * Decrypts each repository's token at most once; a repository without a
 * stored token resolves to null.
 */
export function vaultTokenSource(store: CredentialStore, password: string): TokenSource {
  const cache = new Map<string, Promise<string | null>>();
  return (repository) => {
    let pending = cache.get(repository);
    if (!pending) {
      pending = store.load(repository, password).catch((err: unknown) => {
        if (err instanceof NotFoundError) return null;
        throw err;
      });
      cache.set(repository, pending);
    }
    return pending;
  };
}

export async function promptTokenSource(ctx: BaseContext): Promise<TokenSource> {
  return vaultTokenSource(createCredentialStore(ctx), await readVaultPassword());
}

export async function loadRepositoryToken(ctx: BaseContext, repository: string): Promise<string> {
  return await createCredentialStore(ctx).load(repository, await readVaultPassword());
}
