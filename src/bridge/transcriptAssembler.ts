import type { SpeakerRole } from '../repositories/contracts.js';

type PartialTurn = {
  role: SpeakerRole;
  parts: string[];
  timestamp: string;
};

export type EmitFragment = (role: SpeakerRole, text: string, timestamp: string) => void;

/**
 * Joins consecutive transcript updates from the same speaker into one turn.
 * A turn is emitted when the other speaker starts, on an explicit turn
 * boundary, or on `flush()` when the session closes.
 */
export class TranscriptAssembler {
  private partial: PartialTurn | null = null;

  constructor(private readonly emit: EmitFragment) {}

  add(role: SpeakerRole, text: string, timestamp: string = new Date().toISOString()): void {
    const trimmed = text.trim();
    if (!trimmed) {
      return;
    }

    if (this.partial && this.partial.role !== role) {
      this.flush();
    }
    if (!this.partial) {
      this.partial = { role, parts: [], timestamp };
    }
    this.partial.parts.push(trimmed);
  }

  flush(): void {
    const turn = this.partial;
    if (!turn) {
      return;
    }
    this.partial = null;
    this.emit(turn.role, turn.parts.join(' '), turn.timestamp);
  }
}
