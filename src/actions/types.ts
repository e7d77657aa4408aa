/**
 * Non-verbal decisions a policy can return during PLAYING. The world validates
 * and applies them; an intent that no longer fits the world is dropped.
 */
export type ActionIntent =
  | { kind: 'enter'; room: string }
  | { kind: 'kill'; target: string }
  | { kind: 'sabotage' }
  | { kind: 'report' }
  | { kind: 'task' }
  | { kind: 'idle' };

export function describeIntent(intent: ActionIntent): string {
  switch (intent.kind) {
    case 'enter':
      return `enter ${intent.room}`;
    case 'kill':
      return `kill ${intent.target}`;
    default:
      return intent.kind;
  }
}
