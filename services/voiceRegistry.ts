/**
 * Voice Registry
 *
 * Resolves a speaker label to a voice profile. Lookup order:
 * 1. exact, case-insensitive match on a character's name or aliases
 * 2. substring match between label and an alias, in either direction
 * 3. the default narrator
 * 4. the first registered character
 *
 * Step 2 is ambiguous: a short alias such as "Al" also matches "Alice" or
 * "Narrator Al". The first character in registration order wins.
 */

import type { Character, DialogueSegment, VoiceProfile, VoicedSegment } from '../types/dialogue';
import { ConfigurationError } from './errors';
import { createLogger, type Logger } from './logger';
import { NARRATOR_LABEL } from './dialogueParser';

export type MatchKind = 'exact' | 'partial' | 'narrator' | 'fallback';

export interface Resolution {
  character: Character;
  match: MatchKind;
}

export function createNarrator(gender: string, voice: VoiceProfile): Character {
  return {
    name: NARRATOR_LABEL,
    aliases: [NARRATOR_LABEL, '旁白'],
    gender,
    voice: { ...voice, description: 'Default Narrator' },
    description: 'Default narrator for unassigned text',
  };
}

function namesOf(character: Character): Set<string> {
  return new Set([character.name, ...character.aliases].map(n => n.toLowerCase()));
}

export class VoiceRegistry {
  private readonly characters: readonly Character[];
  private readonly narrator: Character | null;
  private readonly names: ReadonlyMap<Character, Set<string>>;
  private readonly log: Logger;

  constructor(characters: readonly Character[], narrator: Character | null = null, logger?: Logger) {
    const seen = new Set<string>();
    for (const character of characters) {
      const key = character.name.toLowerCase();
      if (seen.has(key)) {
        throw new ConfigurationError(`Duplicate character name "${character.name}"`);
      }
      seen.add(key);
    }

    this.characters = [...characters];
    this.narrator = narrator;
    this.names = new Map(this.characters.map(c => [c, namesOf(c)]));
    this.log = logger ?? createLogger('VoiceRegistry');
  }

  /**
   * Exact name/alias match, then alias substring match. Narrator and
   * first-character fallbacks are not applied here.
   */
  findCharacter(label: string): Resolution | undefined {
    const needle = label.trim().toLowerCase();
    if (!needle) return undefined;

    for (const character of this.characters) {
      if (this.names.get(character)?.has(needle)) {
        return { character, match: 'exact' };
      }
    }

    for (const character of this.characters) {
      for (const alias of character.aliases) {
        const candidate = alias.toLowerCase();
        if (candidate && (candidate.includes(needle) || needle.includes(candidate))) {
          return { character, match: 'partial' };
        }
      }
    }

    return undefined;
  }

  /**
   * @throws ConfigurationError when there is neither a narrator nor any character
   */
  resolveCharacter(label: string): Resolution {
    const found = this.findCharacter(label);
    if (found) {
      this.log.debug(`Found character '${label}' -> ${found.character.name} (${found.match}, spk_id: ${found.character.voice.speakerId})`);
      return found;
    }

    if (this.narrator) {
      this.log.debug(`No character found for '${label}', using default narrator`);
      return { character: this.narrator, match: 'narrator' };
    }

    const first = this.characters[0];
    if (first) {
      this.log.warn(`No character or narrator found for '${label}', using first character ${first.name}`);
      return { character: first, match: 'fallback' };
    }

    throw new ConfigurationError(`Cannot resolve a voice for '${label}': no characters and no default narrator configured`);
  }

  resolve(label: string): VoiceProfile {
    return this.resolveCharacter(label).character.voice;
  }

  /**
   * Binds each segment to its voice before synthesis.
   */
  bindVoices(segments: readonly DialogueSegment[]): VoicedSegment[] {
    return segments.map(segment => ({ ...segment, voice: this.resolve(segment.speaker) }));
  }
}
