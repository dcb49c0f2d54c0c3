import { strict as assert } from 'node:assert'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import test from 'node:test'
import sharp from 'sharp'

import { buildPlaceholderSvg, renderPlaceholderImage, wrapText } from '../src/services/placeholderImage'

test('wrapText fills lines greedily', () => {
  assert.deepEqual(wrapText('one two three', 7), ['one two', 'three'])
})

test('wrapText hard-splits long words and keeps blank lines', () => {
  assert.deepEqual(wrapText('abcdefghij', 4), ['abcd', 'efgh', 'ij'])
  assert.deepEqual(wrapText('a\n\nb', 10), ['a', '', 'b'])
})

test('svg centers styled, escaped lines', () => {
  const svg = buildPlaceholderSvg('**Tea & Cake**\n*Sip <slowly>*', {
    width: 400,
    height: 400,
    fontSize: 20,
    lineHeight: 40,
    marginX: 0
  })

  const lines = svg.split('\n')
  assert.equal(lines[0], '<svg width="400" height="400" viewBox="0 0 400 400" xmlns="http://www.w3.org/2000/svg">')
  assert.equal(lines[1], '<rect width="100%" height="100%" fill="#AAAAAA"/>')
  assert.equal(lines[3], '<text x="200" y="180" font-weight="bold">Tea &amp; Cake</text>')
  assert.equal(lines[4], '<text x="200" y="220" font-style="italic">Sip &lt;slowly&gt;</text>')
  assert.equal(lines.at(-1), '</svg>')
})

test('renders a portrait png', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'placeholder-'))
  try {
    const outPath = path.join(dir, '01_Title_Card_v1.png')
    const written = await renderPlaceholderImage('**Title**\n*Subtitle*', outPath)

    assert.equal(written, outPath)
    const metadata = await sharp(outPath).metadata()
    assert.equal(metadata.format, 'png')
    assert.equal(metadata.width, 1080)
    assert.equal(metadata.height, 1920)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
})
