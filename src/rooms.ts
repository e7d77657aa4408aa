import type { RoomConfig } from './types.js';

/**
 * Room connectivity. Edges are undirected: a connection listed on either side counts.
 */
export class RoomMap {
  private readonly adjacency = new Map<string, Set<string>>();
  readonly meetingRoom: string;

  constructor(rooms: readonly RoomConfig[], meetingRoom: string) {
    for (const r of rooms) this.adjacency.set(r.name, new Set());
    for (const r of rooms) {
      for (const other of r.connections) {
        const a = this.adjacency.get(r.name);
        const b = this.adjacency.get(other);
        if (!a || !b) throw new Error(`Room "${r.name}" connects to unknown room "${other}"`);
        a.add(other);
        b.add(r.name);
      }
    }
    const meetingEdges = this.adjacency.get(meetingRoom);
    if (!meetingEdges) throw new Error(`Meeting room "${meetingRoom}" is not a room`);
    if (meetingEdges.size > 0) throw new Error(`Meeting room "${meetingRoom}" must not connect to other rooms`);
    this.meetingRoom = meetingRoom;
  }

  has(room: string): boolean {
    return this.adjacency.has(room);
  }

  isPlayable(room: string): boolean {
    return this.has(room) && room !== this.meetingRoom;
  }

  areConnected(a: string, b: string): boolean {
    return this.adjacency.get(a)?.has(b) ?? false;
  }

  neighbors(room: string): string[] {
    return Array.from(this.adjacency.get(room) ?? []).sort();
  }

  playableRooms(): string[] {
    return Array.from(this.adjacency.keys()).filter(r => r !== this.meetingRoom);
  }
}
