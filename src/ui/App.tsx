import React, { useEffect, useMemo, useState } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import { eventBus } from '../events/index.js';
import { logger } from '../logger.js';
import { MISSION_ROUNDS } from '../missions.js';
import type { GameLogEntry, LogType, Role } from '../types.js';
import { isEvilRole } from '../utils.js';
import { INITIAL_STATUS, type Pov, type TableStatus, applyHistory, cyclePov, isVisibleTo, povLabel, tailThatFits } from './state.js';

export interface AppProps {
  gameId: string;
  players: string[];
}

const SCROLLBACK = 5000;

const TYPE_COLOR: Partial<Record<LogType, string>> = {
  SYSTEM: 'gray',
  THOUGHT: 'gray',
  BELIEF: 'gray',
  PROPOSAL: 'yellow',
  VOTE: 'blue',
  MISSION: 'cyan',
  ASSASSINATION: 'red',
  WIN: 'green',
};

function roleColor(role: Role): string {
  if (role === 'merlin') return 'blueBright';
  if (role === 'percival') return 'cyan';
  return isEvilRole(role) ? 'redBright' : 'green';
}

function clock(iso: string): string {
  return iso.slice(11, 19) || iso;
}

function plain(e: GameLogEntry): string {
  return `[${clock(e.timestamp)}] [${e.type}] ${e.player ?? ''}: ${e.content}`;
}

function Header({ pov, showThoughts, status }: { pov: Pov; showThoughts: boolean; status: TableStatus }) {
  const score = `${status.missions.filter(Boolean).length}-${status.missions.filter(m => !m).length}`;
  return (
    <Box flexShrink={0}>
      <Text bold>Avalon</Text>
      <Text color="gray">{'  Mission '}</Text>
      <Text>{status.round}</Text>
      <Text color="gray">{'  Score '}</Text>
      <Text>{score}</Text>
      {Array.from({ length: MISSION_ROUNDS }, (_, i) => {
        const passed = status.missions[i];
        return (
          <Text key={i} color={passed === undefined ? 'gray' : passed ? 'green' : 'red'}>
            {` ${passed === undefined ? '·' : passed ? '✓' : '✗'}`}
          </Text>
        );
      })}
      <Text color="gray">{'  Rejections '}</Text>
      <Text color={status.rejectStreak >= 3 ? 'red' : undefined}>{status.rejectStreak}</Text>
      {status.winner ? <Text color={status.winner === 'good' ? 'green' : 'red'}>{`  ${status.winner.toUpperCase()} WINS`}</Text> : null}
      <Text color="gray">{'  POV '}</Text>
      <Text>{povLabel(pov)}</Text>
      <Text color="gray">{'  Thoughts '}</Text>
      <Text>{showThoughts ? 'on' : 'off'}</Text>
    </Box>
  );
}

function LogLine({ entry, showRole }: { entry: GameLogEntry; showRole: boolean }) {
  const role = entry.metadata?.role;
  return (
    <Text wrap="wrap">
      <Text color="gray">[{clock(entry.timestamp)}]</Text> <Text color={TYPE_COLOR[entry.type]}>{`[${entry.type}]`}</Text>
      {entry.player ? (
        <Text color="yellow">
          {` <${entry.player}`}
          {role && showRole ? <Text color={roleColor(role)}>{`:${role}`}</Text> : null}
          {'>'}
        </Text>
      ) : null}
      <Text>{`: ${entry.content}`}</Text>
    </Text>
  );
}

export function App({ gameId, players }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [size, setSize] = useState({ columns: stdout.columns || 80, rows: stdout.rows || 24 });
  const [entries, setEntries] = useState<GameLogEntry[]>(() => logger.getLogs());
  const [status, setStatus] = useState<TableStatus>(INITIAL_STATUS);
  const [pov, setPov] = useState<Pov>({ kind: 'all' });
  const [showThoughts, setShowThoughts] = useState(true);
  const [scroll, setScroll] = useState(0);

  useEffect(() => {
    const onResize = () => setSize({ columns: stdout.columns || 80, rows: stdout.rows || 24 });
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  useEffect(
    () =>
      logger.subscribe(e => {
        setEntries(prev => [...prev.slice(-(SCROLLBACK - 1)), e]);
      }),
    []
  );

  useEffect(
    () =>
      eventBus.on('history', h => {
        if (h.gameId === gameId) setStatus(s => applyHistory(s, h.event));
      }),
    [gameId]
  );

  const logRows = Math.max(1, size.rows - 4);
  const logWidth = Math.max(10, size.columns - 4);

  useInput((input, key) => {
    if (input === 'q' || key.escape) exit();
    else if (key.upArrow) setScroll(v => v + 1);
    else if (key.downArrow) setScroll(v => Math.max(0, v - 1));
    else if (key.pageUp) setScroll(v => v + logRows);
    else if (key.pageDown) setScroll(v => Math.max(0, v - logRows));
    else if (input === 'g') setScroll(0);
    else if (input === 't') setShowThoughts(v => !v);
    else if (input === 'p' || input === ']') setPov(p => cyclePov(p, players, 1));
    else if (input === '[') setPov(p => cyclePov(p, players, -1));
  });

  const shown = useMemo(() => {
    const visible = entries.filter(e => isVisibleTo(e, pov, showThoughts));
    return tailThatFits(visible, plain, logRows, logWidth, scroll);
  }, [entries, pov, showThoughts, logRows, logWidth, scroll]);

  return (
    <Box flexDirection="column" width={size.columns} height={size.rows} overflow="hidden">
      <Header pov={pov} showThoughts={showThoughts} status={status} />
      <Text color="gray">t thoughts | ↑/↓ pgUp/pgDn scroll | g follow | p ] [ point of view | q quit</Text>
      <Box borderStyle="round" flexDirection="column" paddingX={1} height={logRows + 2} overflow="hidden" flexGrow={1}>
        {shown.map(e => (
          <LogLine key={e.id} entry={e} showRole={pov.kind === 'all'} />
        ))}
      </Box>
    </Box>
  );
}
