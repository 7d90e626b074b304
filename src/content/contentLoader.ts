import fs from 'fs-extra';
import { campaignPath } from '../config.js';
import { ContentFormatError, PersistenceIOError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import { ContentValidator } from './contentValidator.js';
import { StoryGraph } from './storyGraph.js';

const validator = new ContentValidator();

export function readContentDocument(p: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(p, 'utf8');
  } catch (error) {
    throw new PersistenceIOError(`Could not read story content at ${p}`, 'read', p, error);
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ContentFormatError(
      `Story content at ${p} is not valid JSON`,
      p,
      [error instanceof Error ? error.message : String(error)]
    );
  }
}

export const loadStory = (p: string): StoryGraph => {
  const story = StoryGraph.fromJSON(readContentDocument(p), p);
  const result = validator.validateStory(story.toJSON());
  if (!result.ok) {
    throw new ContentFormatError(
      `Story content at ${p} failed validation`,
      p,
      result.issues.map((issue) => `${issue.path}: ${issue.message}`)
    );
  }
  logger.info('Story loaded', { path: p, scenes: story.size });
  return story;
};

export const loadCampaign = (name?: string): StoryGraph => loadStory(campaignPath(name));
