/**
 * Audit Log: hash-chained JSONL
 *
 * One line per execution attempt. Each entry carries the hash of the
 * previous one, so editing or deleting a line breaks the chain.
 * Entries are frozen once written and the log is only ever appended to.
 */

import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { canonicalJSON, sha256 } from './hash.js';
import type { ActionProposal, AuditEntry, ExecutionResult, ValidatedAction } from '../core/types.js';

export interface AuditRecord {
  userText: string;
  proposal: ActionProposal;
  action: ValidatedAction | null;
  result: ExecutionResult;
  confirmed: boolean;
}

export interface AuditLog {
  append(record: AuditRecord): AuditEntry;
}

export interface ChainVerification {
  valid: boolean;
  eventCount: number;
  error?: string;
}

export class FileAuditLog implements AuditLog {
  private logPath: string;
  private lastHash: string | null = null;
  private count = 0;

  constructor(logPath: string) {
    this.logPath = logPath;
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    this.restoreChainState();
  }

  get path(): string {
    return this.logPath;
  }

  get size(): number {
    return this.count;
  }

  /**
   * Restore hash chain state from an existing log file.
   */
  private restoreChainState(): void {
    for (const entry of readAuditEntries(this.logPath)) {
      this.lastHash = entry.hash;
      this.count++;
    }
  }

  append(record: AuditRecord): AuditEntry {
    const unsigned = {
      id: `au_${uuidv4()}`,
      timestamp: new Date().toISOString(),
      userText: record.userText,
      proposal: record.proposal,
      action: record.action,
      result: record.result,
      confirmed: record.confirmed,
      previousHash: this.lastHash,
    };

    const entry: AuditEntry = deepFreeze({ ...unsigned, hash: sha256(canonicalJSON(unsigned)) });

    fs.appendFileSync(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
    this.lastHash = entry.hash;
    this.count++;

    return entry;
  }

  /** Most recent entries, oldest first. */
  tail(limit: number): AuditEntry[] {
    const entries = readAuditEntries(this.logPath);
    return limit > 0 ? entries.slice(-limit) : [];
  }

  /**
   * Verify the integrity of the hash chain.
   */
  verifyChain(): ChainVerification {
    return verifyAuditFile(this.logPath);
  }
}

export function readAuditEntries(logPath: string): AuditEntry[] {
  if (!fs.existsSync(logPath)) return [];
  const content = fs.readFileSync(logPath, 'utf-8');
  const entries: AuditEntry[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    try {
      entries.push(JSON.parse(line) as AuditEntry);
    } catch {
      // verifyChain reports malformed lines
    }
  }
  return entries;
}

export function verifyAuditFile(logPath: string): ChainVerification {
  if (!fs.existsSync(logPath)) {
    return { valid: true, eventCount: 0 };
  }

  const lines = fs.readFileSync(logPath, 'utf-8').split('\n').filter(l => l.trim());
  let previousHash: string | null = null;
  let count = 0;

  for (const line of lines) {
    let entry: AuditEntry;
    try {
      entry = JSON.parse(line) as AuditEntry;
    } catch {
      return { valid: false, eventCount: count, error: `Malformed entry at line ${count + 1}` };
    }

    if (entry.previousHash !== previousHash) {
      return {
        valid: false,
        eventCount: count,
        error: `Chain broken at entry ${count + 1}: expected previous hash ${previousHash}, got ${entry.previousHash}`,
      };
    }

    const { hash, ...rest } = entry;
    if (sha256(canonicalJSON(rest)) !== hash) {
      return { valid: false, eventCount: count, error: `Hash mismatch at entry ${count + 1}` };
    }

    previousHash = hash;
    count++;
  }

  return { valid: true, eventCount: count };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
