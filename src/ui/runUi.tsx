import React from 'react';
import { render } from 'ink';
import type { World } from '../engine/world.js';
import { App } from './App.js';

/** Mount the terminal view over a running world. It only ever reads snapshots. */
export function runUi(world: World, refreshMs: number) {
  return render(<App getSnapshot={() => world.snapshot()} refreshMs={refreshMs} />);
}
