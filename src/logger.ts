import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'node:crypto';
import chalk from 'chalk';
import type { GameLogEntry, LogType, Role } from './types.js';
import { eventBus } from './events/index.js';
import { isTruthyEnv } from './utils.js';

const ROLE_COLORS: Record<Role, (text: string) => string> = {
  merlin: chalk.blueBright,
  percival: chalk.cyan,
  servant: chalk.green,
  assassin: chalk.redBright,
  morgana: chalk.magenta,
  mordred: chalk.red,
  oberon: chalk.gray,
  minion: chalk.red,
};

const TYPE_COLORS: Record<LogType, (text: string) => string> = {
  SYSTEM: chalk.gray,
  PROPOSAL: chalk.yellow,
  VOTE: chalk.blue,
  MISSION: chalk.cyan,
  CHAT: chalk.white,
  ASSASSINATION: chalk.bgRed.white,
  WIN: chalk.green.bold,
  THOUGHT: chalk.gray.italic,
  BELIEF: chalk.gray,
};

const ROLE_WORDS = /\b(merlin|percival|servant|assassin|morgana|mordred|oberon|minion)s?\b/gi;
const NAME_COLOR = chalk.hex('#FFA500');

function isRole(value: string): value is Role {
  return Object.hasOwn(ROLE_COLORS, value);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Transcript form of one entry, or undefined when it is not part of the public record.
 * Only entries marked `public` qualify, and never thoughts or belief traces.
 */
export function transcriptLine(entry: GameLogEntry): string | undefined {
  if (entry.metadata?.visibility !== 'public') return undefined;
  if (entry.type === 'THOUGHT' || entry.type === 'BELIEF') return undefined;
  if (entry.type === 'CHAT') {
    return entry.player ? `${entry.player}: ${entry.content}` : `[CHAT] ${entry.content}`;
  }
  return `[${entry.type}] ${entry.player ? `${entry.player} ` : ''}${entry.content}`.trimEnd();
}

export function buildTranscriptText(entries: readonly GameLogEntry[]): string {
  const lines = entries.flatMap(e => {
    const line = transcriptLine(e);
    return line === undefined ? [] : [line];
  });
  return `${lines.join('\n')}\n`;
}

/**
 * Collects every log entry of the process.
 *
 * Entries go out on the event bus; the logger keeps them in memory, forwards them to its
 * subscribers, prints them and (when enabled) appends them under `logs/`: one JSON object
 * per line, plus a plain transcript of the public record.
 */
export class GameLogger {
  private readonly logDir: string;
  private readonly entriesFile: string;
  private readonly transcriptFile: string;
  private logs: GameLogEntry[] = [];
  private consoleOutputEnabled = true;
  private persistenceEnabled = false;
  private subscribers = new Set<(entry: GameLogEntry) => void>();
  // gameId -> player name -> role, for tagging and colouring entries.
  private rosters = new Map<string, Map<string, Role>>();
  private namePattern: RegExp | undefined;

  constructor(logDir = path.join(process.cwd(), 'logs')) {
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logDir = logDir;
    this.entriesFile = path.join(logDir, `game-${stamp}.jsonl`);
    this.transcriptFile = path.join(logDir, `transcript-${stamp}.txt`);

    eventBus.on('log', entry => {
      this.handleEntry(entry);
    });
  }

  /** Off by default so tests and embedded sessions leave no files behind. */
  setPersistenceEnabled(enabled: boolean) {
    this.persistenceEnabled = enabled;
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  /** Records who plays what in `gameId`; later entries by those players are tagged with the role. */
  registerGame(gameId: string, roster: Readonly<Record<string, Role>>) {
    this.rosters.set(gameId, new Map(Object.entries(roster)));
    this.rebuildNamePattern();
  }

  /** Forgets the roster of a finished game. */
  unregisterGame(gameId: string) {
    if (this.rosters.delete(gameId)) this.rebuildNamePattern();
  }

  registeredGames(): string[] {
    return [...this.rosters.keys()];
  }

  subscribe(cb: (entry: GameLogEntry) => void): () => void {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  getLogs(): GameLogEntry[] {
    return this.logs.slice();
  }

  /** Stamps the entry, publishes it and returns it as stored. */
  log(entry: Omit<GameLogEntry, 'id' | 'timestamp'>): GameLogEntry {
    const full = this.withRole({ id: randomUUID(), timestamp: new Date().toISOString(), ...entry });
    eventBus.publish('log', full);
    return full;
  }

  formatConsoleLine(entry: GameLogEntry): string {
    const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const role = entry.metadata?.role;
    const who = entry.player
      ? ` <${NAME_COLOR(entry.player)}${role ? ` ${ROLE_COLORS[role](role)}` : ''}>`
      : '';

    let content = entry.content.replace(ROLE_WORDS, word => {
      const base = word.toLowerCase().replace(/s$/, '');
      return isRole(base) ? ROLE_COLORS[base](word) : word;
    });
    if (this.namePattern) content = content.replace(this.namePattern, name => NAME_COLOR(name));

    return `${chalk.gray(`[${time}]`)} ${TYPE_COLORS[entry.type](`[${entry.type}]`)}${who}: ${content}`;
  }

  private rebuildNamePattern() {
    const names = [...new Set([...this.rosters.values()].flatMap(r => [...r.keys()]))];
    this.namePattern = names.length ? new RegExp(`\\b(${names.map(escapeRegExp).join('|')})\\b`, 'g') : undefined;
  }

  private withRole(entry: GameLogEntry): GameLogEntry {
    const meta = entry.metadata;
    if (!entry.player || !meta?.gameId || 'role' in meta) return entry;
    const role = this.rosters.get(meta.gameId)?.get(entry.player);
    return role === undefined ? entry : { ...entry, metadata: { ...meta, role } };
  }

  private handleEntry(entry: GameLogEntry) {
    this.logs.push(entry);
    this.persist(entry);

    for (const sub of this.subscribers) {
      try {
        sub(entry);
      } catch (error) {
        console.error('Log subscriber failed:', error);
      }
    }

    if (!this.consoleOutputEnabled) return;
    if (entry.type === 'THOUGHT' && !isTruthyEnv('AVALON_PRINT_THOUGHTS')) return;
    console.log(this.formatConsoleLine(entry));
  }

  private persist(entry: GameLogEntry) {
    if (!this.persistenceEnabled) return;
    fs.mkdirSync(this.logDir, { recursive: true });
    fs.appendFileSync(this.entriesFile, `${JSON.stringify(entry)}\n`);
    const line = transcriptLine(entry);
    if (line !== undefined) fs.appendFileSync(this.transcriptFile, `${line}\n`);
  }
}

export const logger = new GameLogger();
