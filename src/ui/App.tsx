import React, { useEffect, useMemo, useState } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import { logger } from '../logger.js';
import type { Role, SimLogEntry } from '../types.js';
import type { AgentSnapshot, WorldSnapshot } from '../engine/world.js';
import { countBadByAgent } from '../knowledge/worlds.js';
import { byId } from '../utils.js';

type LogFilter = 'ALL' | 'PUBLIC';

export interface AppProps {
  // Polled once per refresh; the UI never mutates the world.
  getSnapshot: () => WorldSnapshot;
  refreshMs: number;
}

function typeColor(type: SimLogEntry['type']): string | undefined {
  switch (type) {
    case 'SYSTEM':
    case 'BELIEF':
      return 'gray';
    case 'ACTION':
      return 'yellow';
    case 'VOTE':
      return 'blue';
    case 'DEATH':
      return 'red';
    case 'WIN':
      return 'green';
    case 'SAY':
      return 'cyan';
    case 'MOVE':
    default:
      return undefined;
  }
}

function roleColor(role: Role | undefined): string | undefined {
  return role === 'bad' ? 'redBright' : role === 'good' ? 'green' : undefined;
}

function certaintyColor(c: AgentSnapshot['memory'][number]['certainty']): string {
  switch (c) {
    case 'FACT':
      return 'white';
    case 'UNCERTAIN':
      return 'gray';
    case 'VERIFIED':
      return 'green';
    case 'DISPROVED':
      return 'red';
  }
}

function estimateWrappedLines(text: string, width: number): number {
  if (width <= 0) return 0;
  // Approximation by character width; only used to decide how much tail fits.
  return text.split('\n').reduce((acc, p) => acc + Math.max(1, Math.ceil(p.length / width)), 0);
}

function entryToPlainText(e: SimLogEntry): string {
  const time = e.simTime !== undefined ? e.simTime.toFixed(1) : '-';
  return `[${time}] [${e.type}]${e.player ? ` <${e.player}>` : ''}: ${e.content}`;
}

function Header({ snap }: { snap: WorldSnapshot }) {
  const living = snap.agents.filter(a => a.lifeState === 'alive').length;
  return (
    <Box flexShrink={0}>
      <Text bold>Kripke Crew</Text>
      <Text>  </Text>
      <Text color="gray">t=</Text>
      <Text>{snap.elapsedTime.toFixed(1)}</Text>
      <Text color="gray">  turn </Text>
      <Text>{snap.turnCount}</Text>
      <Text color="gray">  alive </Text>
      <Text>{living}</Text>
      <Text>  </Text>
      {snap.result ? (
        <Text color={snap.result === 'good_win' ? 'green' : 'redBright'} bold>
          {snap.result === 'good_win' ? 'GOOD AGENTS WIN' : 'BAD AGENTS WIN'}
        </Text>
      ) : snap.meeting ? (
        <Text color="magenta" bold>
          MEETING {snap.meeting.step}
          {snap.meeting.step === 'STATEMENTS' ? ` (${snap.meeting.queue.length} left)` : ''}
        </Text>
      ) : (
        <Text color="gray">next meeting in {snap.timeUntilMeeting.toFixed(1)}</Text>
      )}
    </Box>
  );
}

function RoomsPanel({ snap }: { snap: WorldSnapshot }) {
  return (
    <Box borderStyle="round" flexDirection="column" paddingX={1} width={34} flexShrink={0}>
      {snap.rooms.map(room => {
        const here = snap.agents.filter(a => a.location === room);
        const alive = here.filter(a => a.lifeState === 'alive');
        const bodies = here.filter(a => a.lifeState === 'dead');
        return (
          <Text key={room} wrap="truncate-end">
            <Text color={room === snap.meetingRoom ? 'magenta' : 'white'}>{room.padEnd(11)}</Text>
            {alive.map(a => (
              <Text key={a.id} color={roleColor(a.role)}>
                {` ${a.id}`}
              </Text>
            ))}
            {bodies.map(a => (
              <Text key={a.id} color="red">{` x${a.id}`}</Text>
            ))}
          </Text>
        );
      })}
    </Box>
  );
}

function BrainPanel({ agent, rows }: { agent: AgentSnapshot | undefined; rows: number }) {
  const ranked = useMemo(() => {
    if (!agent) return [];
    const counts = countBadByAgent(agent.worlds);
    return agent.suspicion
      .map(([id, score]) => ({ id, score, badWorlds: counts.get(id) ?? 0 }))
      .sort((a, b) => b.badWorlds - a.badWorlds || b.score - a.score || byId(a.id, b.id));
  }, [agent]);

  if (!agent) return <Text color="gray">No agent selected</Text>;
  const memoryRows = Math.max(1, rows - ranked.length - 3);

  return (
    <Box borderStyle="round" flexDirection="column" paddingX={1} flexGrow={1} overflow="hidden">
      <Text>
        <Text bold>{agent.id}</Text>
        <Text color={roleColor(agent.role)}> ({agent.role})</Text>
        <Text color={agent.lifeState === 'alive' ? 'green' : 'red'}> {agent.lifeState}</Text>
        <Text color="gray"> {agent.behavior} @ {agent.location ?? 'removed'}</Text>
        <Text color="gray">  worlds: </Text>
        <Text>{agent.worlds.length}</Text>
      </Text>
      {ranked.map(r => (
        <Text key={r.id} wrap="truncate-end">
          <Text>{r.id.padEnd(8)}</Text>
          <Text color="gray"> bad in </Text>
          <Text>{`${r.badWorlds}/${agent.worlds.length}`.padEnd(6)}</Text>
          <Text color="gray"> suspicion </Text>
          <Text color={r.score > 0.5 ? 'yellow' : undefined}>{r.score.toFixed(2)}</Text>
        </Text>
      ))}
      <Text color="gray">memory:</Text>
      {agent.memory.slice(-memoryRows).map(m => (
        <Text key={`${m.seq}-${m.sourceType}`} wrap="truncate-end" color={certaintyColor(m.certainty)}>
          {`#${m.seq} ${m.certainty.padEnd(9)} ${m.description}${m.sourceId ? ` (via ${m.sourceId})` : ''}`}
        </Text>
      ))}
    </Box>
  );
}

export function App(props: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [dimensions, setDimensions] = useState(() => ({
    columns: stdout.columns ?? 80,
    rows: stdout.rows ?? 24,
  }));
  const [snap, setSnap] = useState<WorldSnapshot>(() => props.getSnapshot());
  const [entries, setEntries] = useState<SimLogEntry[]>(() => logger.getLogs());
  const [selected, setSelected] = useState(0);
  const [filter, setFilter] = useState<LogFilter>('PUBLIC');

  useEffect(() => {
    const onResize = () => {
      setDimensions({ columns: stdout.columns ?? 80, rows: stdout.rows ?? 24 });
    };
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  useEffect(() => {
    const timer = setInterval(() => setSnap(props.getSnapshot()), props.refreshMs);
    return () => clearInterval(timer);
  }, [props]);

  useEffect(() => {
    const unsub = logger.subscribe(e => {
      setEntries(prev => {
        const next = [...prev, e];
        // Keep bounded scrollback for performance.
        return next.length > 2000 ? next.slice(-2000) : next;
      });
    });
    return () => {
      unsub();
    };
  }, []);

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      exit();
      return;
    }
    if (input === ']') {
      setSelected(i => (i + 1) % Math.max(1, snap.agents.length));
      return;
    }
    if (input === '[') {
      setSelected(i => (i - 1 + snap.agents.length) % Math.max(1, snap.agents.length));
      return;
    }
    if (input === 'v') {
      setFilter(f => (f === 'ALL' ? 'PUBLIC' : 'ALL'));
    }
  });

  const agent = snap.agents[selected];
  const headerRows = 2;
  const topRows = Math.max(snap.rooms.length, (agent?.suspicion.length ?? 0) + 4) + 2;
  const logBoxHeight = Math.max(3, dimensions.rows - headerRows - topRows);
  const logContentRows = Math.max(1, logBoxHeight - 2);
  const logContentWidth = Math.max(10, dimensions.columns - 4);

  const lines = useMemo(() => {
    const visible = entries.filter(e => {
      if (filter === 'ALL') return true;
      if (e.type === 'BELIEF') return false;
      return e.metadata?.visibility === 'public';
    });
    const picked: SimLogEntry[] = [];
    let used = 0;
    for (let i = visible.length - 1; i >= 0; i--) {
      const e = visible[i];
      if (!e) continue;
      used += estimateWrappedLines(entryToPlainText(e), logContentWidth);
      if (used > logContentRows && picked.length > 0) break;
      picked.unshift(e);
    }
    return picked;
  }, [entries, filter, logContentRows, logContentWidth]);

  return (
    <Box flexDirection="column" width={dimensions.columns} height={dimensions.rows} overflow="hidden">
      <Header snap={snap} />
      <Box>
        <Text color="gray">Keys:</Text>
        <Text> [/] select agent</Text>
        <Text color="gray"> | </Text>
        <Text>v log: {filter.toLowerCase()}</Text>
        <Text color="gray"> | </Text>
        <Text>q/esc quit</Text>
      </Box>
      <Box flexDirection="row" height={topRows} flexShrink={0}>
        <RoomsPanel snap={snap} />
        <BrainPanel agent={agent} rows={topRows - 2} />
      </Box>
      <Box borderStyle="round" flexDirection="column" paddingX={1} height={logBoxHeight} overflow="hidden" flexGrow={1}>
        {lines.map(e => (
          <Text key={e.id} wrap="wrap">
            <Text color="gray">[{e.simTime !== undefined ? e.simTime.toFixed(1) : '-'}]</Text>{' '}
            <Text color={typeColor(e.type)}>{`[${e.type}]`}</Text>
            {e.player ? <Text color="yellow">{` <${e.player}>`}</Text> : null}
            <Text>: {e.content}</Text>
          </Text>
        ))}
      </Box>
    </Box>
  );
}
