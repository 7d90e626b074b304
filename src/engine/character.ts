import {
  ABILITIES,
  characterSchema,
  formatIssues,
  type Ability,
  type CharacterData,
  type CharacterInit,
  type Inventory,
  type Stats,
} from '../models.js';
import { SnapshotFormatError } from '../utils/errorhandler.js';

export function abilityModifier(score: number): number {
  return Math.floor((score - 10) / 2);
}

export function proficiencyBonus(level: number): number {
  return 2 + Math.floor((level - 1) / 4);
}

/**
 * A playable (or non-playable) character. Hit points are not clamped here;
 * rule sets decide what a value at or below zero means.
 */
export class Character {
  name: string;
  race?: string;
  charClass?: string;
  level: number;
  stats: Stats;
  hp: number;
  maxHp?: number;
  xp: number;
  inventory: Inventory;

  constructor(init: CharacterInit) {
    const data = characterSchema.parse(init);
    this.name = data.name;
    this.race = data.race;
    this.charClass = data.charClass;
    this.level = data.level;
    this.stats = { ...data.stats };
    this.hp = data.hp;
    this.maxHp = data.maxHp;
    this.xp = data.xp;
    this.inventory = { items: [...data.inventory.items], gold: data.inventory.gold };
  }

  get proficiencyBonus(): number {
    return proficiencyBonus(this.level);
  }

  /** Dexterity modifier. */
  get initiative(): number {
    return this.modifier('dex');
  }

  get alive(): boolean {
    return this.hp > 0;
  }

  modifier(ability: Ability): number {
    return abilityModifier(this.stats[ability]);
  }

  // Callers are responsible for raising maxHp, features, spells, etc.
  levelUp(): void {
    this.level += 1;
  }

  toString(): string {
    const abilities = ABILITIES.map((a) => {
      const mod = this.modifier(a);
      return `${a.toUpperCase()}:${this.stats[a]}(${mod >= 0 ? '+' : ''}${mod})`;
    }).join(', ');
    const kind = [this.race, this.charClass].filter(Boolean).join(' ');
    return `<Character ${this.name} - L${this.level}${kind ? ` ${kind}` : ''} | HP:${this.hp} | ${abilities}>`;
  }

  toJSON(): CharacterData {
    return {
      name: this.name,
      ...(this.race !== undefined ? { race: this.race } : {}),
      ...(this.charClass !== undefined ? { charClass: this.charClass } : {}),
      level: this.level,
      stats: { ...this.stats },
      hp: this.hp,
      ...(this.maxHp !== undefined ? { maxHp: this.maxHp } : {}),
      xp: this.xp,
      inventory: { items: [...this.inventory.items], gold: this.inventory.gold },
    };
  }

  static fromJSON(data: unknown): Character {
    const parsed = characterSchema.safeParse(data);
    if (!parsed.success) {
      throw new SnapshotFormatError('Invalid character data', undefined, formatIssues(parsed.error));
    }
    return new Character(parsed.data);
  }
}
