import { strict as assert } from 'node:assert'
import test from 'node:test'

import { sanitizeForFilename, slideBaseName, variantFileName } from '../shared/utils/filenames'

test('denylisted characters are stripped and whitespace becomes underscores', () => {
  assert.equal(sanitizeForFilename('Your Birth Month: "Cursed" Items?'), 'Your_Birth_Month_Cursed_Items')
  assert.equal(sanitizeForFilename('a/b\\c<d>e|f*g'), 'abcdefg')
})

test('leading and trailing dots are trimmed and length is capped', () => {
  assert.equal(sanitizeForFilename('  ..hidden.. '), 'hidden')
  assert.equal(sanitizeForFilename('x'.repeat(100)).length, 80)
})

test('empty results use the fallback', () => {
  assert.equal(sanitizeForFilename('???'), 'untitled')
  assert.equal(sanitizeForFilename('', 'theme'), 'theme')
})

test('slide base names are zero-padded and sanitized', () => {
  assert.equal(slideBaseName(2, 'January – Item'), '02_January_–_Item')
  assert.equal(slideBaseName(1, '***'), '01_Slide_1')
  assert.equal(slideBaseName(12, 'Title Card'), '12_Title_Card')
})

test('variant file names carry the variant number', () => {
  assert.equal(variantFileName('01_Title_Card', 2), '01_Title_Card_v2.png')
})
