#!/usr/bin/env tsx
/**
 * Bundle the bridge CLI into a standalone ESM file.
 *
 * Everything is bundled; the bridge has no runtime dependencies outside
 * Node built-ins.
 */
import { mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import * as esbuild from 'esbuild'

const __dirname = dirname(fileURLToPath(import.meta.url))
const root = join(__dirname, '..')

function getPackageVersion(): string {
  const content = readFileSync(join(root, 'package.json'), 'utf-8')
  const parsed: unknown = JSON.parse(content)
  if (parsed !== null && typeof parsed === 'object' && 'version' in parsed) {
    if (typeof parsed.version === 'string') return parsed.version
  }
  return '0.0.0-unknown'
}

async function bundle() {
  const version = getPackageVersion()
  console.log(`Bundling stdio-bridge v${version}...`)

  const bundleDir = join(root, 'dist', 'bundle')
  const bundlePath = join(bundleDir, 'stdio-bridge.mjs')
  mkdirSync(bundleDir, { recursive: true })

  const result = await esbuild.build({
    entryPoints: [join(root, 'src', 'bin', 'bridge.ts')],
    bundle: true,
    platform: 'node',
    target: 'node20',
    format: 'esm',
    outfile: bundlePath,
    minify: false,
    sourcemap: false,
    banner: {
      js: `// stdio-bridge bundle v${version}
// Do not edit directly - regenerate with: npm run bundle
`
    },
    define: {
      'process.env.STDIO_BRIDGE_VERSION': JSON.stringify(version)
    },
    metafile: true
  })

  writeFileSync(join(bundleDir, 'meta.json'), JSON.stringify(result.metafile, null, 2))

  // Exactly one shebang, at the very start
  let bundleContent = readFileSync(bundlePath, 'utf-8')
  bundleContent = bundleContent.replace(/^#!.*\n/gm, '')
  bundleContent = '#!/usr/bin/env node\n' + bundleContent
  writeFileSync(bundlePath, bundleContent)

  const sizeKB = (Buffer.byteLength(bundleContent) / 1024).toFixed(1)
  console.log(`Bundle created: dist/bundle/stdio-bridge.mjs (${sizeKB} KB)`)
}

bundle().catch((err) => {
  console.error('Bundle failed:', err)
  process.exit(1)
})
