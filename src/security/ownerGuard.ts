export type OwnerGuard = (tgUserId: number | undefined) => boolean;

export function parseOwnerIds(raw: string): number[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => Number(s))
    .filter((n) => Number.isSafeInteger(n) && n > 0);
}

/**
 * The bot serves a single learner: only the configured Telegram ids pass.
 */
export function createOwnerGuard(ownerIds: readonly number[]): OwnerGuard {
  const allowed = new Set<number>(ownerIds);
  return (tgUserId) => tgUserId !== undefined && allowed.has(tgUserId);
}
