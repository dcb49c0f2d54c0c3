import { strict as assert } from 'node:assert'
import test from 'node:test'
import { GenerateContentResponse, type GenerateContentParameters } from '@google/genai'

import { GeminiError } from '../shared/errors'
import { classifyTheme } from '../shared/utils/themeClassifier'
import {
  buildPlaceholderDeck,
  createGeminiTextGenerator,
  generatePlaceholderText,
  generateSlides,
  type GenerateContentClient
} from '../src/services/slideGeneration'

function textResponse(...texts: string[]): GenerateContentResponse {
  const response = new GenerateContentResponse()
  response.candidates = [{ content: { role: 'model', parts: texts.map(text => ({ text })) } }]
  return response
}

function fakeClient(handler: (params: GenerateContentParameters) => Promise<GenerateContentResponse>) {
  const calls: GenerateContentParameters[] = []
  const client: GenerateContentClient = {
    models: {
      generateContent: async (params) => {
        calls.push(params)
        return handler(params)
      }
    }
  }
  return { client, calls }
}

test('placeholder deck for a month theme parses into the full calendar', async () => {
  const theme = 'Moonlit Birth Month'
  const result = await generateSlides(theme, classifyTheme(theme), generatePlaceholderText)

  assert.equal(result.slides.length, 13)
  assert.deepEqual(result.warnings, [])
  assert.equal(result.slides[0].label, 'Title Card')
  assert.equal(result.slides[0].visual, 'Placeholder visual for the title card of "Moonlit Birth Month"')
  assert.equal(result.slides[0].displayText, '**Moonlit Birth Month**\n*Placeholder subtitle*')
  assert.equal(result.slides[1].label, 'January')
  assert.equal(result.slides[12].label, 'December')
  assert.equal(result.slides[12].displayText, '**December – Placeholder Item**\n*Placeholder detail*')
  assert.ok(result.raw.endsWith('*Placeholder detail*\n'))
})

test('placeholder deck sizes follow the template', () => {
  const classDeck = buildPlaceholderDeck('Classes of the Deep', classifyTheme('Classes of the Deep'))
  assert.equal(classDeck.split('\n\n---\n\n').length, 14)
  assert.ok(classDeck.includes('### **Slide 14 – Artificer**'))

  const genericDeck = buildPlaceholderDeck('Tea Rituals', classifyTheme('Tea Rituals'))
  assert.equal(genericDeck.split('\n\n---\n\n').length, 13)
  assert.ok(genericDeck.includes('### **Slide 13 – Concept 12**'))
})

test('short output is kept with a count warning', async () => {
  const raw = '**visual:** A teapot\nSteep slowly'
  const result = await generateSlides('Tea Rituals', classifyTheme('Tea Rituals'), async () => raw)

  assert.equal(result.slides.length, 1)
  assert.equal(result.slides[0].label, 'Title Card')
  assert.equal(result.slides[0].displayText, 'Steep slowly')
  assert.deepEqual(result.warnings, ['Expected 13 slides, but parsed 1. Check generated text format.'])
})

test('generateSlides hands both prompts to the text source', async () => {
  let seenUser = ''
  let seenSystem = ''
  await generateSlides('Tea Rituals', classifyTheme('Tea Rituals'), async (prompt) => {
    seenUser = prompt.user
    seenSystem = prompt.system
    return ''
  })

  assert.ok(seenUser.includes('Generate a 13-slide carousel series'))
  assert.ok(seenSystem.length > 0)
})

test('gemini text generator joins candidate parts and sends settings', async () => {
  const { client, calls } = fakeClient(async () => textResponse('first half, ', 'second half\n'))
  const generate = createGeminiTextGenerator(client, { model: 'test-model', temperature: 0.5, timeoutMs: 1000 })

  const theme = 'Tea Rituals'
  const text = await generate({ theme, template: classifyTheme(theme), system: 'sys', user: 'usr' })

  assert.equal(text, 'first half, second half')
  assert.equal(calls.length, 1)
  assert.equal(calls[0].model, 'test-model')
  assert.deepEqual(calls[0].contents, [{ role: 'user', parts: [{ text: 'usr' }] }])
  assert.equal(calls[0].config?.temperature, 0.5)
  assert.deepEqual(calls[0].config?.systemInstruction, { parts: [{ text: 'sys' }] })
})

test('gemini text generator does not retry invalid requests', async () => {
  const { client, calls } = fakeClient(async () => {
    throw Object.assign(new Error('prompt rejected'), { status: 400 })
  })
  const generate = createGeminiTextGenerator(client, { model: 'test-model', temperature: 0.5, timeoutMs: 1000 })

  await assert.rejects(
    generate({ theme: 't', template: classifyTheme('t'), system: 's', user: 'u' }),
    (error: unknown) => error instanceof GeminiError && error.code === 'INVALID_REQUEST' && error.message === 'prompt rejected'
  )
  assert.equal(calls.length, 1)
})
