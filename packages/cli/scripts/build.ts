import { build } from 'esbuild';
import fs from 'fs/promises';
import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const CLI_PKG = path.resolve(__dirname, '..');
const OUT = path.resolve(CLI_PKG, 'dist');
const MATCH_WORKER = path.resolve(CLI_PKG, '../matcher/src/match-worker.ts');

function readDependencyNames(): string[] {
  const pkg: unknown = JSON.parse(readFileSync(path.join(CLI_PKG, 'package.json'), 'utf-8'));
  if (typeof pkg !== 'object' || pkg === null || !('dependencies' in pkg)) return [];
  const deps = pkg.dependencies;
  return typeof deps === 'object' && deps !== null ? Object.keys(deps) : [];
}

async function buildCLI() {
  await fs.rm(OUT, { recursive: true, force: true });

  // Inlines the workspace packages (shipped as TypeScript sources),
  // externalizes everything installed from the registry.
  console.log('Bundling CLI...');
  await build({
    entryPoints: [path.join(CLI_PKG, 'src/cli.ts')],
    bundle: true,
    platform: 'node',
    target: 'node20',
    format: 'esm',
    outfile: path.join(OUT, 'bin/cli.js'),
    external: readDependencyNames().filter((name) => !name.startsWith('@subseq/')),
    sourcemap: true,
    banner: { js: '#!/usr/bin/env node' },
  });

  await fs.chmod(path.join(OUT, 'bin/cli.js'), 0o755);

  // The matcher spawns its pool from a sibling of the bundle
  console.log('Bundling match worker...');
  await build({
    entryPoints: [MATCH_WORKER],
    bundle: true,
    platform: 'node',
    target: 'node20',
    format: 'esm',
    outfile: path.join(OUT, 'bin/match-worker.js'),
    sourcemap: true,
  });

  console.log('Build complete.');
}

await buildCLI();
