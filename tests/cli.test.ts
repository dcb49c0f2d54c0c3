import { strict as assert } from 'node:assert'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import test from 'node:test'

import { ConfigError } from '../shared/errors'
import { main, parseCliArgs } from '../src/index'

test('defaults', () => {
  assert.deepEqual(parseCliArgs([]), {
    input: undefined,
    theme: undefined,
    limit: undefined,
    offline: false,
    force: false,
    envPath: 'config.env',
    help: false
  })
})

test('flags are parsed', () => {
  const options = parseCliArgs(['--input', 'themes.csv', '--limit', '3', '--offline', '--force', '--env', 'local.env'])
  assert.equal(options.input, 'themes.csv')
  assert.equal(options.limit, 3)
  assert.equal(options.offline, true)
  assert.equal(options.force, true)
  assert.equal(options.envPath, 'local.env')
  assert.equal(parseCliArgs(['-h']).help, true)
})

test('bad limits and unknown flags are rejected', () => {
  assert.throws(() => parseCliArgs(['--limit', 'ten']), ConfigError)
  assert.throws(() => parseCliArgs(['--colour']))
})

test('help exits cleanly', async () => {
  assert.equal(await main(['--help']), 0)
})

const ENV_KEYS = ['OUTPUT_DIR', 'LEDGER_PATH', 'IMAGE_VARIANTS', 'UPLOAD_PROVIDER']

test('offline run produces a manifest and records the theme', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'cli-'))
  try {
    const envPath = path.join(dir, 'test.env')
    const outputDir = path.join(dir, 'out')
    const ledgerPath = path.join(dir, 'processed_themes.txt')
    await writeFile(envPath, [
      `OUTPUT_DIR=${outputDir}`,
      `LEDGER_PATH=${ledgerPath}`,
      'IMAGE_VARIANTS=1',
      'UPLOAD_PROVIDER=none'
    ].join('\n'))

    const code = await main(['--offline', '--theme', 'Tea Rituals', '--env', envPath])

    assert.equal(code, 0)
    assert.equal(await readFile(ledgerPath, 'utf8'), 'Tea Rituals\n')
    const manifest = await readFile(path.join(outputDir, 'Tea_Rituals', 'slides.csv'), 'utf8')
    assert.ok(manifest.startsWith('theme,slide_number,label,visual,slide_text,image_v1,image_v2\n'))
  } finally {
    for (const key of ENV_KEYS) delete process.env[key]
    await rm(dir, { recursive: true, force: true })
  }
})

test('a missing input manifest exits with an error code', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'cli-'))
  try {
    const code = await main(['--offline', '--input', path.join(dir, 'missing.csv'), '--env', path.join(dir, 'none.env')])
    assert.equal(code, 1)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
})
