import { partySchema, formatIssues, type PartyData } from '../models.js';
import { SnapshotFormatError } from '../utils/errorhandler.js';
import { Character } from './character.js';

export class Party {
  private readonly roster: Character[];

  constructor(members: Iterable<Character> = []) {
    this.roster = [...members];
  }

  get members(): readonly Character[] {
    return this.roster;
  }

  get size(): number {
    return this.roster.length;
  }

  add(member: Character): void {
    this.roster.push(member);
  }

  find(name: string): Character | undefined {
    return this.roster.find((c) => c.name === name);
  }

  anyAlive(): boolean {
    return this.roster.some((c) => c.hp > 0);
  }

  living(): Character[] {
    return this.roster.filter((c) => c.hp > 0);
  }

  toJSON(): PartyData {
    return { members: this.roster.map((c) => c.toJSON()) };
  }

  static fromJSON(data: unknown): Party {
    const parsed = partySchema.safeParse(data);
    if (!parsed.success) {
      throw new SnapshotFormatError('Invalid party data', undefined, formatIssues(parsed.error));
    }
    return new Party(parsed.data.members.map((m) => new Character(m)));
  }
}
