import { z } from 'zod';

// ── Characters ───────────────────────────────────────────────────────────────

export const ABILITIES = ['str', 'dex', 'con', 'int', 'wis', 'cha'] as const;
export type Ability = (typeof ABILITIES)[number];

export const statsSchema = z.object({
  str: z.number().int().default(10),
  dex: z.number().int().default(10),
  con: z.number().int().default(10),
  int: z.number().int().default(10),
  wis: z.number().int().default(10),
  cha: z.number().int().default(10),
});

export const inventorySchema = z.object({
  items: z.array(z.string()).default([]),
  gold: z.number().int().default(0),
});

export const characterSchema = z.object({
  name: z.string().min(1),
  race: z.string().optional(),
  charClass: z.string().optional(),
  level: z.number().int().min(1).default(1),
  stats: statsSchema.default({}),
  hp: z.number().int().default(10),
  maxHp: z.number().int().positive().optional(),
  xp: z.number().int().default(0),
  inventory: inventorySchema.default({}),
});

export const partySchema = z.object({
  members: z.array(characterSchema),
});

export type Stats = z.infer<typeof statsSchema>;
export type Inventory = z.infer<typeof inventorySchema>;
export type CharacterData = z.infer<typeof characterSchema>;
export type CharacterInit = z.input<typeof characterSchema>;
export type PartyData = z.infer<typeof partySchema>;

// ── Story content ────────────────────────────────────────────────────────────

export const sceneSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  monsters: z.array(z.string()).default([]),
  choices: z.record(z.string(), z.string()).default({}), // key → next scene id
});

export const storySchema = z.object({
  scenes: z.array(sceneSchema),
});

export type SceneDef = z.infer<typeof sceneSchema>;
export type StoryDef = z.infer<typeof storySchema>;

// ── Randomness ───────────────────────────────────────────────────────────────

export const rngStateSchema = z.object({
  algorithm: z.literal('mulberry32'),
  state: z.number().int().min(0).max(0xffffffff),
});

export type RngState = z.infer<typeof rngStateSchema>;

// ── Save files ───────────────────────────────────────────────────────────────

export const snapshotSchema = z
  .object({
    party: partySchema,
    story_state: storySchema,
    current_scene_idx: z.number().int().min(0),
    rng_state: rngStateSchema,
    saved_at: z.number().optional(),
  })
  .superRefine((snap, ctx) => {
    if (snap.current_scene_idx > snap.story_state.scenes.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['current_scene_idx'],
        message: `must be between 0 and ${snap.story_state.scenes.length}`,
      });
    }
  });

export type GameStateSnapshot = z.infer<typeof snapshotSchema>;

// ── Rules ────────────────────────────────────────────────────────────────────

export type CombatOutcome = 'victory' | 'defeat' | 'unresolved';

export type DirectorStatus = 'uninitialized' | 'active' | 'complete' | 'defeated';

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
