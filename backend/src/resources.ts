import * as fs from 'fs';
import * as path from 'path';
import * as nunjucks from 'nunjucks';
import { createLogger, NAMESPACES } from './logging.js';

const resourcesLog = createLogger(NAMESPACES.config);

/** Text files the prompt and directives need, read once at startup. */
export interface ProxyResources {
  readonly prefill: string;
  readonly think: string;
  /** Preset text by name (file name without extension). */
  readonly presets: ReadonlyMap<string, string>;
  readonly banner: string;
}

export interface BannerContext {
  name: string;
  version: string;
  admin: string;
  url: string;
}

function readOptional(file: string): string {
  if (!fs.existsSync(file)) {
    resourcesLog(`[RESOURCES] WARNING: ${path.basename(file)} not found`);
    return '';
  }
  return fs.readFileSync(file, 'utf-8');
}

function readPresets(dir: string): Map<string, string> {
  const presets = new Map<string, string>();
  if (!fs.existsSync(dir)) return presets;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name))) {
    if (!entry.isFile()) continue;
    presets.set(entry.name.split('.')[0], fs.readFileSync(path.join(dir, entry.name), 'utf-8'));
  }
  return presets;
}

export function loadResources(dir: string, banner: BannerContext): ProxyResources {
  const presets = readPresets(path.join(dir, 'presets'));

  let bannerText = '';
  if (fs.existsSync(path.join(dir, 'banner.njk'))) {
    const env = new nunjucks.Environment(new nunjucks.FileSystemLoader(dir), { autoescape: false });
    bannerText = env.render('banner.njk', { ...banner, presets: [...presets.keys()] }).trim();
  } else {
    resourcesLog('[RESOURCES] WARNING: banner.njk not found');
  }

  return Object.freeze({
    prefill: readOptional(path.join(dir, 'prefill.txt')),
    think: readOptional(path.join(dir, 'think.txt')),
    presets,
    banner: bannerText
  });
}
