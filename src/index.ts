export { CFG, campaignPath } from './config.js';
export * from './models.js';
export { Mulberry32, hashSeed, type Rng, type RngSeed } from './engine/rng.js';
export { DiceRoller, parseDiceExpression, type DiceExpression, type RollResult } from './engine/dice.js';
export { Character, abilityModifier, proficiencyBonus } from './engine/character.js';
export { Party } from './engine/party.js';
export { PlaceholderRuleSet, type RuleSet } from './engine/ruleset.js';
export { Director, type DirectorHooks, type DirectorOptions, type RestoredSession } from './engine/director.js';
export { fromDirector, applyToDirector, parseSnapshot, snapshotsEqual, storyChanged } from './engine/gameState.js';
export { Scene, StoryGraph, type SceneHost } from './content/storyGraph.js';
export { loadStory, loadCampaign, readContentDocument } from './content/contentLoader.js';
export { ContentValidator, type ValidationIssue, type ValidationResult } from './content/contentValidator.js';
export { saveSnapshot, loadSnapshot } from './persistence/serializer.js';
export { parseCommand, handleCommand, runCli, type Command, type CommandResult, type CliOptions } from './ui/cli.js';
export * from './utils/errorhandler.js';
export { logger, Logger, type LogLevelName } from './utils/logger.js';
