import { describe, it, expect } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const packagesDir = fileURLToPath(new URL('../../../', import.meta.url));

function readJson(...segments: string[]): unknown {
  return JSON.parse(fs.readFileSync(path.join(packagesDir, ...segments), 'utf8'));
}

describe('workspace package layout', () => {
  it.each(['sqlite', 'cli'])('%s loads compiled JavaScript at run time and sources for checking', (name) => {
    expect(readJson(name, 'package.json')).toMatchObject({
      exports: {
        '.': {
          'sqlcell-source': './src/index.ts',
          types: './dist/index.d.ts',
          default: './dist/index.js',
        },
      },
    });
    expect(readJson(name, 'tsconfig.build.json')).toMatchObject({
      compilerOptions: { customConditions: [], rootDir: 'src', outDir: 'dist' },
    });
    expect(fs.existsSync(path.join(packagesDir, name, 'src', 'index.ts'))).toBe(true);
  });

  it('points the sqlcell bin at the compiled entry point', () => {
    expect(readJson('cli', 'package.json')).toMatchObject({
      bin: { sqlcell: './dist/bin/sqlcell.js' },
    });
    expect(fs.existsSync(path.join(packagesDir, 'cli', 'src', 'bin', 'sqlcell.ts'))).toBe(true);
  });
});
