import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import chalk from 'chalk';
import type { LogType, Role, SimLogEntry } from './types.js';
import { eventBus } from './events/index.js';
import { envFlag } from './utils.js';

const ROLE_COLORS: Record<Role, (text: string) => string> = {
  good: chalk.green,
  bad: chalk.red,
};

const TYPE_COLORS: Record<LogType, (text: string) => string> = {
  SYSTEM: chalk.gray,
  MOVE: chalk.white,
  ACTION: chalk.yellow,
  SAY: chalk.cyan,
  VOTE: chalk.blue,
  DEATH: chalk.bgRed.white,
  WIN: chalk.green.bold,
  BELIEF: chalk.gray.italic,
};

export class SimLogger {
  private logFile: string | null = null;
  private transcriptFile: string | null = null;
  private logs: SimLogEntry[] = [];
  private knownAgents: Set<string> = new Set();
  private consoleOutputEnabled = true;
  private persistenceEnabled = false;
  private subscribers: Set<(entry: SimLogEntry) => void> = new Set();
  private agentRoles: Map<string, Role> = new Map();

  constructor() {
    // The logger subscribes to the global event bus and persists/prints entries.
    eventBus.subscribe(entry => {
      this.handleEntry(entry);
    });
  }

  /**
   * Enable or disable appending structured logs / transcripts under `logs/`.
   *
   * Off by default so tests and library use never touch the filesystem; the CLI turns it on.
   */
  setPersistenceEnabled(enabled: boolean) {
    this.persistenceEnabled = enabled;
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  setKnownAgents(ids: string[]) {
    this.knownAgents = new Set(ids);
  }

  setAgentRoles(roles: Record<string, Role>) {
    this.agentRoles = new Map(Object.entries(roles));
  }

  subscribe(cb: (entry: SimLogEntry) => void): () => void {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  getLogs(): SimLogEntry[] {
    return this.logs.slice();
  }

  clear() {
    this.logs = [];
  }

  /**
   * Emit a log entry to the global event bus, returning the fully materialized entry.
   *
   * The logger itself listens on the bus and persists/prints entries.
   */
  log(entry: Omit<SimLogEntry, 'id' | 'timestamp'>): SimLogEntry {
    const fullEntry: SimLogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    const enriched = this.enrichEntry(fullEntry);
    eventBus.emit(enriched);
    return enriched;
  }

  private enrichEntry(entry: SimLogEntry): SimLogEntry {
    // Only infer the role if metadata doesn't carry one already.
    const hasRoleProperty = entry.metadata && 'role' in entry.metadata;
    const inferredRole = entry.player && !hasRoleProperty ? this.agentRoles.get(entry.player) : undefined;
    if (inferredRole === undefined) return entry;
    return {
      ...entry,
      metadata: { ...(entry.metadata ?? {}), role: inferredRole },
    };
  }

  private handleEntry(entry: SimLogEntry) {
    this.logs.push(entry);
    this.persist(entry);

    for (const sub of this.subscribers) {
      try {
        sub(entry);
      } catch (error) {
        // A broken subscriber (e.g. the UI) must not stop the simulation.
        console.error('Log subscriber failed:', error);
      }
    }

    if (!this.consoleOutputEnabled) return;
    if (entry.type === 'BELIEF' && !envFlag('KRIPKE_CREW_PRINT_BELIEFS')) return;
    console.log(this.formatForConsole(entry));
  }

  formatForConsole(entry: SimLogEntry): string {
    const simTime = entry.simTime !== undefined ? `t=${entry.simTime.toFixed(1)}` : entry.timestamp;
    const prefix = chalk.gray(`[${simTime}]`);
    const typeStr = TYPE_COLORS[entry.type](`[${entry.type}]`);

    let agentInfo = '';
    if (entry.player) {
      const role = entry.metadata?.role ?? this.agentRoles.get(entry.player);
      const roleStr = role ? ` ${ROLE_COLORS[role](role)}` : '';
      agentInfo = ` <${chalk.hex('#FFA500')(entry.player)}${roleStr}>`;
    }

    let content = entry.content;
    if (this.knownAgents.size > 0) {
      const invalidChars = /[.*+?^${}()|[\]\\]/g;
      const names = Array.from(this.knownAgents).map(n => n.replace(invalidChars, '\\$&'));
      const agentPattern = new RegExp(`\\b(${names.join('|')})\\b`, 'g');
      content = content.replace(agentPattern, match => chalk.hex('#FFA500')(match));
    }

    return `${prefix} ${typeStr}${agentInfo}: ${content}`;
  }

  private persist(entry: SimLogEntry) {
    if (!this.persistenceEnabled) return;
    if (!this.logFile || !this.transcriptFile) {
      const stamp = new Date().toISOString().replace(/[:.]/g, '-');
      const logDir = path.join(process.cwd(), 'logs');
      fs.mkdirSync(logDir, { recursive: true });
      this.logFile = path.join(logDir, `sim-${stamp}.jsonl`);
      this.transcriptFile = path.join(logDir, `transcript-${stamp}.txt`);
    }
    fs.appendFileSync(this.logFile, `${JSON.stringify(entry)}\n`);
    const line = this.toTranscriptLine(entry);
    if (line !== null) fs.appendFileSync(this.transcriptFile, `${line}\n`);
  }

  private toTranscriptLine(entry: SimLogEntry): string | null {
    // Private entries (what a single agent saw or concluded) stay out of the public transcript.
    if (entry.metadata?.visibility === 'private' || entry.type === 'BELIEF') return null;
    const time = entry.simTime !== undefined ? `[t=${entry.simTime.toFixed(1)}] ` : '';
    if (entry.type === 'SAY' && entry.player) return `${time}${entry.player}: ${entry.content}`;
    return `${time}[${entry.type}] ${entry.player ? `${entry.player} ` : ''}${entry.content}`.trimEnd();
  }
}

export const logger = new SimLogger();
