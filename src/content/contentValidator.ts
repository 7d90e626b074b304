import type { StoryDef } from '../models.js';

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ValidationResult {
  ok: boolean;
  issues: ValidationIssue[];
}

export class ContentValidator {
  validateStory(story: StoryDef): ValidationResult {
    const issues: ValidationIssue[] = [];

    if (story.scenes.length === 0) {
      issues.push({ path: 'scenes', message: 'story has no scenes' });
    }

    const seen = new Map<string, number>();
    story.scenes.forEach((scene, index) => {
      const first = seen.get(scene.id);
      if (first !== undefined) {
        issues.push({
          path: `scenes[${index}].id`,
          message: `duplicate scene id "${scene.id}" (first defined at scenes[${first}])`
        });
      } else {
        seen.set(scene.id, index);
      }
    });

    story.scenes.forEach((scene, index) => {
      for (const [key, target] of Object.entries(scene.choices)) {
        if (!seen.has(target)) {
          issues.push({
            path: `scenes[${index}].choices.${key}`,
            message: `choice points at unknown scene "${target}"`
          });
        }
      }
    });

    return { ok: issues.length === 0, issues };
  }
}
