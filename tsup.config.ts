import { defineConfig } from 'tsup';
import { readFileSync } from 'fs';
import { join } from 'path';

interface PackageManifest {
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
}

const packageJson: PackageManifest = JSON.parse(
  readFileSync(join(process.cwd(), 'package.json'), 'utf-8'),
);

// Every declared dependency stays external; consumers install their own copies
const allExternals = Array.from(
  new Set([
    ...Object.keys(packageJson.dependencies ?? {}),
    ...Object.keys(packageJson.peerDependencies ?? {}),
    ...Object.keys(packageJson.devDependencies ?? {}),
  ]),
).sort();

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    'ceph-client': 'src/lib/unit/plugins/ceph-client.ts',
  },
  outDir: 'dist',
  format: ['cjs', 'esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  external: allExternals,
});
