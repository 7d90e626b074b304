import 'dotenv/config';
import path from 'node:path';

export const CFG = {
  contentRoot: process.env.CONTENT_ROOT || './content',
  campaign: process.env.CAMPAIGN || 'goblin_caves',
  savePath: process.env.SAVE_PATH || './save.json',
  rngSeed: process.env.RNG_SEED || undefined,
  logLevel: process.env.LOG_LEVEL || 'INFO',
};

export function campaignPath(name = CFG.campaign, contentRoot = CFG.contentRoot): string {
  return path.join(contentRoot, 'campaigns', `${name}.json`);
}
