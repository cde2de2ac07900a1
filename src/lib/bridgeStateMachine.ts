export type BridgeState = 'CONNECTING' | 'ACTIVE' | 'CLOSING' | 'CLOSED' | 'FAILED';

const ALLOWED_BRIDGE_STATE_TRANSITIONS: Record<BridgeState, ReadonlySet<BridgeState>> = {
  CONNECTING: new Set<BridgeState>(['ACTIVE', 'FAILED']),
  ACTIVE: new Set<BridgeState>(['CLOSING', 'FAILED']),
  CLOSING: new Set<BridgeState>(['CLOSED', 'FAILED']),
  CLOSED: new Set<BridgeState>([]),
  FAILED: new Set<BridgeState>([])
};

export function canTransitionBridgeState(from: BridgeState, to: BridgeState): boolean {
  return ALLOWED_BRIDGE_STATE_TRANSITIONS[from].has(to);
}

export function isTerminalBridgeState(state: BridgeState): boolean {
  return ALLOWED_BRIDGE_STATE_TRANSITIONS[state].size === 0;
}
