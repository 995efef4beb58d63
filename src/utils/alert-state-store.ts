import { randomUUID } from "node:crypto";
import { link, mkdir, readFile, rename, stat, unlink, writeFile } from "node:fs/promises";
import { hostname } from "node:os";
import path from "node:path";
import { z } from "zod";

import {
  ALERT_CHANNELS,
  type AlertChannel,
  type AlertState,
  type ChannelState,
  type Verdict,
} from "../model/alert-model";
import { errorMessage, StateCorruptError, StateLockedError, StatePersistError } from "./errors";

const ChannelRecordSchema = z.object({
  channelId: z.enum(["IMMEDIATE", "FORECAST"]),
  lastFiredAt: z.string().datetime({ offset: true }).optional(),
  lastNotifiedPeakAt: z.string().datetime({ offset: true }).optional(),
});

const StateFileSchema = z.object({
  channels: z.array(ChannelRecordSchema),
});

export type ChannelRecord = z.infer<typeof ChannelRecordSchema>;
export type StateFile = z.infer<typeof StateFileSchema>;

const LockSchema = z.object({
  lockedBy: z.string(),
  lockedAt: z.number(),
  expiresAt: z.number(),
});

type LockRecord = z.infer<typeof LockSchema>;

export function toStateFile(state: AlertState): StateFile {
  const channels: ChannelRecord[] = [];
  for (const channelId of ALERT_CHANNELS) {
    const s = state[channelId];
    if (!s) continue;
    const record: ChannelRecord = { channelId };
    if (s.lastFiredAt !== undefined) record.lastFiredAt = new Date(s.lastFiredAt).toISOString();
    if (s.lastNotifiedPeakAt !== undefined) {
      record.lastNotifiedPeakAt = new Date(s.lastNotifiedPeakAt).toISOString();
    }
    channels.push(record);
  }
  return { channels };
}

export function fromStateFile(file: StateFile): AlertState {
  const state: AlertState = {};
  for (const r of file.channels) {
    const s: ChannelState = {};
    if (r.lastFiredAt !== undefined) s.lastFiredAt = Date.parse(r.lastFiredAt);
    if (r.lastNotifiedPeakAt !== undefined) s.lastNotifiedPeakAt = Date.parse(r.lastNotifiedPeakAt);
    state[r.channelId] = s;
  }
  return state;
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

export type AlertStateStore = {
  load(): Promise<AlertState>;
  save(state: AlertState): Promise<void>;
  withLock<T>(fn: () => Promise<T>): Promise<T>;
};

export class FileAlertStateStore implements AlertStateStore {
  private readonly lockPath: string;
  private readonly lockTtlMs: number;
  private readonly clock: () => number;
  private lockToken: string | null = null;

  constructor(
    readonly filePath: string,
    opts?: { lockTtlMs?: number; clock?: () => number },
  ) {
    this.lockPath = `${filePath}.lock`;
    this.lockTtlMs = opts?.lockTtlMs ?? 5 * 60 * 1000;
    this.clock = opts?.clock ?? Date.now;
  }

  async load(): Promise<AlertState> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isErrno(err, "ENOENT")) return {};
      throw new StateCorruptError(this.filePath, errorMessage(err), { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StateCorruptError(this.filePath, "not valid JSON", { cause: err });
    }

    const parsed = StateFileSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      throw new StateCorruptError(this.filePath, issues.join("; "));
    }
    return fromStateFile(parsed.data);
  }

  // write-then-rename, so a crash leaves either the old or the new record
  async save(state: AlertState): Promise<void> {
    const tmp = `${this.filePath}.tmp`;
    try {
      await mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
      await writeFile(tmp, JSON.stringify(toStateFile(state), null, 2) + "\n", "utf8");
      await rename(tmp, this.filePath);
    } catch (err) {
      throw new StatePersistError(this.filePath, { cause: err });
    }
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquireLock();
    try {
      return await fn();
    } finally {
      await this.releaseLock();
    }
  }

  private async acquireLock(): Promise<void> {
    const token = `${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;
    if (await this.tryCreateLock(token)) return;

    const holder = await this.readHolder(this.lockPath);
    if (holder !== null && holder.expiresAt > this.clock()) {
      throw new StateLockedError(this.lockPath, holder.lockedBy);
    }

    if (holder !== null) {
      console.warn(`[state] taking over expired lock ${this.lockPath} (held by ${holder.lockedBy})`);
      await this.moveAsideIfExpired();
    }
    if (await this.tryCreateLock(token)) return;

    const winner = await this.readHolder(this.lockPath);
    throw new StateLockedError(this.lockPath, winner?.lockedBy ?? "unknown");
  }

  // The lock content is written to a private file first and linked into
  // place, so the lock path never exists without its holder record.
  private async tryCreateLock(token: string): Promise<boolean> {
    const now = this.clock();
    const lock: LockRecord = { lockedBy: token, lockedAt: now, expiresAt: now + this.lockTtlMs };
    const tmp = `${this.lockPath}.${randomUUID()}.tmp`;
    await mkdir(path.dirname(path.resolve(this.lockPath)), { recursive: true });
    await writeFile(tmp, JSON.stringify(lock), { encoding: "utf8", flag: "wx" });
    try {
      await link(tmp, this.lockPath);
    } catch (err) {
      if (isErrno(err, "EEXIST")) return false;
      throw err;
    } finally {
      await unlink(tmp);
    }
    this.lockToken = token;
    return true;
  }

  /**
   * Renames the lock to a private path and inspects what was moved. Only one
   * contender can rename a given file; if the moved lock turns out to be live
   * (re-created by another run after our read) it is linked back.
   */
  private async moveAsideIfExpired(): Promise<void> {
    const aside = `${this.lockPath}.${randomUUID()}.stale`;
    try {
      await rename(this.lockPath, aside);
    } catch (err) {
      if (isErrno(err, "ENOENT")) return;
      throw err;
    }
    try {
      const moved = await this.readHolder(aside);
      if (moved !== null && moved.expiresAt > this.clock()) {
        try {
          await link(aside, this.lockPath);
        } catch (err) {
          if (!isErrno(err, "EEXIST")) throw err;
        }
        throw new StateLockedError(this.lockPath, moved.lockedBy);
      }
    } finally {
      await unlink(aside);
    }
  }

  /**
   * Holder of a lock file, or null when the file is gone. A file without a
   * readable record counts as held until its mtime is older than the TTL.
   */
  private async readHolder(file: string): Promise<LockRecord | null> {
    let raw: string;
    let mtimeMs: number;
    try {
      [raw, { mtimeMs }] = await Promise.all([readFile(file, "utf8"), stat(file)]);
    } catch (err) {
      if (isErrno(err, "ENOENT")) return null;
      throw err;
    }
    const parsed = LockSchema.safeParse(parseJsonOrNull(raw));
    if (parsed.success) return parsed.data;
    return { lockedBy: "unknown", lockedAt: mtimeMs, expiresAt: mtimeMs + this.lockTtlMs };
  }

  private async releaseLock(): Promise<void> {
    const token = this.lockToken;
    this.lockToken = null;
    if (token === null) return;

    const holder = await this.readHolder(this.lockPath);
    if (holder?.lockedBy !== token) {
      console.warn(`[state] lock ${this.lockPath} no longer ours, leaving it`);
      return;
    }
    try {
      await unlink(this.lockPath);
    } catch (err) {
      if (!isErrno(err, "ENOENT")) throw err;
    }
  }
}

function parseJsonOrNull(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/**
 * Downgrades a firing verdict that the channel's history says must not
 * surface yet. Dedup only applies while the cooldown is running; once it has
 * elapsed the same peak may fire again.
 */
export function applyStateGates(
  verdict: Verdict,
  channelState: ChannelState | undefined,
  now: number,
  cooldownSeconds: number,
): Verdict {
  if (!verdict.fires) return verdict;

  const last = channelState?.lastFiredAt;
  const cooling = last !== undefined && now - last < cooldownSeconds * 1000;
  if (!cooling) return verdict;

  const remaining = Math.ceil((cooldownSeconds * 1000 - (now - last)) / 1000);
  if (
    verdict.channel === "FORECAST" &&
    verdict.peakTime !== undefined &&
    channelState?.lastNotifiedPeakAt === verdict.peakTime
  ) {
    return {
      ...verdict,
      fires: false,
      suppressedBy: "dedup",
      reason: `${verdict.reason}; peak ${new Date(verdict.peakTime).toISOString()} already notified (cooldown ${remaining}s left)`,
    };
  }

  return {
    ...verdict,
    fires: false,
    suppressedBy: "cooldown",
    reason: `${verdict.reason}; cooldown active (${remaining}s left)`,
  };
}

export function commitFiring(state: AlertState, verdict: Verdict, now: number): AlertState {
  const channel: AlertChannel = verdict.channel;
  const prev = state[channel] ?? {};
  const next: ChannelState = {
    ...prev,
    lastFiredAt: Math.max(prev.lastFiredAt ?? now, now),
  };
  if (channel === "FORECAST" && verdict.peakTime !== undefined) {
    next.lastNotifiedPeakAt = verdict.peakTime;
  }
  return { ...state, [channel]: next };
}
