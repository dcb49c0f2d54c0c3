import { strict as assert } from 'node:assert'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import test from 'node:test'

import { ConfigError } from '../shared/errors'
import type { ManifestRow, SlideRecord } from '../shared/types'
import {
  parseManifest,
  parseThemeList,
  readManifest,
  readThemeList,
  serializeManifest,
  toManifestRow,
  writeManifest
} from '../src/services/manifest'

const slide: SlideRecord = {
  ordinal: 3,
  label: 'February',
  visual: 'A knight, "smiling", at dawn',
  displayText: '**February – Frost**\n*Cold, but cozy*'
}

test('failed outcomes are written as the sentinel and a missing variant as empty', () => {
  const both = toManifestRow('Birth Month', slide, [
    { status: 'generated', path: 'out/a_v1.png' },
    { status: 'failed', reason: 'boom' }
  ])
  assert.equal(both.imageV1, 'out/a_v1.png')
  assert.equal(both.imageV2, 'GENERATION_FAILED')

  const single = toManifestRow('Birth Month', slide, [{ status: 'placeholder', path: 'out/a_v1.png' }])
  assert.equal(single.imageV2, '')
  assert.equal(single.ordinal, 3)
})

test('header row names the manifest columns', () => {
  const csv = serializeManifest([])
  assert.equal(csv, 'theme,slide_number,label,visual,slide_text,image_v1,image_v2\n')
})

test('quotes, commas and newlines survive a write and read', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'manifest-'))
  try {
    const row = toManifestRow('Birth Month', slide, [
      { status: 'generated', path: 'out/03_February_v1.png' },
      { status: 'failed', reason: 'boom' }
    ])
    const filePath = path.join(dir, 'nested', 'slides.csv')
    await writeManifest(filePath, [row])

    const content = await readFile(filePath, 'utf8')
    assert.ok(content.includes('"A knight, ""smiling"", at dawn"'))

    const rows: ManifestRow[] = await readManifest(filePath)
    assert.deepEqual(rows, [row])
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
})

test('rows with a bad slide number are rejected', () => {
  const csv = 'theme,slide_number,label,visual,slide_text,image_v1,image_v2\nT,zero,L,V,Text,a.png,\n'
  assert.throws(() => parseManifest(csv), /Row 1: 'slide_number' must be a positive integer/)
})

test('theme list dedupes, trims and skips blanks', () => {
  const csv = '\uFEFFId, Theme ,Notes\n1,Birth Month,x\n2,,y\n3,  Tea Rituals ,z\n4,Birth Month,w\n'
  assert.deepEqual(parseThemeList(csv), ['Birth Month', 'Tea Rituals'])
})

test('theme list without a Theme column is a config error', () => {
  assert.throws(
    () => parseThemeList('Name\nfoo\n', 'themes.csv'),
    (error: unknown) => error instanceof ConfigError && error.message === "themes.csv has no 'Theme' column"
  )
})

test('missing input file is a config error', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'themes-'))
  try {
    const missing = path.join(dir, 'nope.csv')
    await assert.rejects(
      readThemeList(missing),
      (error: unknown) => error instanceof ConfigError && error.message === `Input manifest not found or unreadable: ${missing}`
    )

    const present = path.join(dir, 'themes.csv')
    await writeFile(present, 'Theme\nClasses of the Deep\n')
    assert.deepEqual(await readThemeList(present), ['Classes of the Deep'])
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
})
