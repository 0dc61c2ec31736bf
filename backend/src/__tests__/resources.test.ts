import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadResources } from '../resources.js';

const banner = { name: 'Test Proxy', version: '1.2.3', admin: 'Tester', url: 'https://proxy.test' };

describe('loadResources', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rp-resources-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads prompt files and presets by name', () => {
    fs.writeFileSync(path.join(dir, 'prefill.txt'), 'Continue the scene.');
    fs.writeFileSync(path.join(dir, 'think.txt'), 'Think first.');
    fs.mkdirSync(path.join(dir, 'presets'));
    fs.writeFileSync(path.join(dir, 'presets', 'vivid.txt'), 'Be vivid.');
    fs.writeFileSync(path.join(dir, 'presets', 'concise.txt'), 'Be brief.');

    const resources = loadResources(dir, banner);

    expect(resources.prefill).toBe('Continue the scene.');
    expect(resources.think).toBe('Think first.');
    expect([...resources.presets]).toEqual([
      ['concise', 'Be brief.'],
      ['vivid', 'Be vivid.']
    ]);
    expect(resources.banner).toBe('');
  });

  it('renders the banner with the preset names', () => {
    fs.mkdirSync(path.join(dir, 'presets'));
    fs.writeFileSync(path.join(dir, 'presets', 'vivid.txt'), 'Be vivid.');
    fs.writeFileSync(path.join(dir, 'presets', 'concise.txt'), 'Be brief.');
    fs.writeFileSync(
      path.join(dir, 'banner.njk'),
      '\n{{ name }} {{ version }} by {{ admin }}{% for preset in presets %} //preset {{ preset }}{% endfor %} <{{ url }}/quiet/>\n'
    );

    expect(loadResources(dir, banner).banner).toBe(
      'Test Proxy 1.2.3 by Tester //preset concise //preset vivid <https://proxy.test/quiet/>'
    );
  });

  it('leaves missing files empty', () => {
    const resources = loadResources(dir, banner);
    expect(resources).toEqual({ prefill: '', think: '', presets: new Map(), banner: '' });
    expect(Object.isFrozen(resources)).toBe(true);
  });
});
