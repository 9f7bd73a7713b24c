import { SpeakerEntry } from '../types/index.js';
import { UNKNOWN_SPEAKER_ID } from './SpeakerAssigner.js';

export const SPEAKER_PALETTE = ['blue', 'green', 'purple', 'orange', 'pink', 'teal'] as const;
export const UNKNOWN_SPEAKER_COLOR = 'gray';
export const UNKNOWN_SPEAKER_LABEL = 'Unknown speaker';

/**
 * Session-scoped speaker table. Speakers are numbered and colored in order of
 * first appearance; colors repeat only once the palette wraps.
 */
export class SpeakerRegistry {
  private readonly entries = new Map<string, SpeakerEntry>();
  private numbered = 0;

  constructor(private readonly palette: readonly string[] = SPEAKER_PALETTE) {
    if (palette.length === 0) {
      throw new Error('Speaker palette must contain at least one color');
    }
  }

  getOrCreate(speakerId: string): SpeakerEntry {
    const existing = this.entries.get(speakerId);
    if (existing) {
      return existing;
    }

    let entry: SpeakerEntry;
    if (speakerId === UNKNOWN_SPEAKER_ID) {
      entry = { speakerId, displayLabel: UNKNOWN_SPEAKER_LABEL, colorToken: UNKNOWN_SPEAKER_COLOR };
    } else {
      const colorToken = this.palette[this.numbered % this.palette.length];
      this.numbered += 1;
      entry = { speakerId, displayLabel: `Speaker ${this.numbered}`, colorToken };
    }

    this.entries.set(speakerId, entry);
    return entry;
  }

  /** Distinct identified speakers */
  get speakerCount(): number {
    return this.numbered;
  }

  list(): SpeakerEntry[] {
    return Array.from(this.entries.values());
  }

  clear(): void {
    this.entries.clear();
    this.numbered = 0;
  }
}
