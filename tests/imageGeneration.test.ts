import { strict as assert } from 'node:assert'
import test from 'node:test'
import { BlockedReason, GenerateContentResponse, Modality, type GenerateContentParameters } from '@google/genai'

import { GeminiError, ImageGenError } from '../shared/errors'
import { createGeminiImageGenerator, toImageGenError } from '../src/services/imageGeneration'
import type { GenerateContentClient } from '../src/services/slideGeneration'

function clientReturning(response: GenerateContentResponse) {
  const calls: GenerateContentParameters[] = []
  const client: GenerateContentClient = {
    models: {
      generateContent: async (params) => {
        calls.push(params)
        return response
      }
    }
  }
  return { client, calls }
}

test('returns the inline image payload and requests a portrait image', async () => {
  const response = new GenerateContentResponse()
  response.candidates = [{
    content: {
      role: 'model',
      parts: [{ text: 'here you go' }, { inlineData: { data: 'aGVsbG8=', mimeType: 'image/jpeg' } }]
    }
  }]
  const { client, calls } = clientReturning(response)

  const image = await createGeminiImageGenerator(client, { model: 'test-image-model' })('draw a lantern')

  assert.deepEqual(image, { base64Data: 'aGVsbG8=', mimeType: 'image/jpeg' })
  assert.equal(calls.length, 1)
  assert.equal(calls[0].model, 'test-image-model')
  assert.deepEqual(calls[0].config?.responseModalities, [Modality.IMAGE])
  assert.deepEqual(calls[0].config?.imageConfig, { aspectRatio: '9:16', imageSize: '1K' })
  assert.equal(calls[0].config?.temperature, 0.7)
})

test('defaults the mime type to png', async () => {
  const response = new GenerateContentResponse()
  response.candidates = [{ content: { role: 'model', parts: [{ inlineData: { data: 'aGVsbG8=' } }] } }]
  const { client } = clientReturning(response)

  const image = await createGeminiImageGenerator(client, { model: 'm' })('prompt')
  assert.equal(image.mimeType, 'image/png')
})

test('blocked prompts fail once without retrying', async () => {
  const response = new GenerateContentResponse()
  response.promptFeedback = { blockReason: BlockedReason.SAFETY }
  const { client, calls } = clientReturning(response)

  await assert.rejects(
    createGeminiImageGenerator(client, { model: 'm' })('prompt'),
    (error: unknown) => error instanceof ImageGenError && error.code === 'SAFETY_BLOCKED'
  )
  assert.equal(calls.length, 1)
})

function clientThrowing(error: Error) {
  let calls = 0
  const client: GenerateContentClient = {
    models: {
      generateContent: async () => {
        calls++
        throw error
      }
    }
  }
  return { client, calls: () => calls }
}

test('network failures are reported as NETWORK', async () => {
  const { client, calls } = clientThrowing(new Error('fetch failed: ECONNRESET'))

  await assert.rejects(
    createGeminiImageGenerator(client, { model: 'm', retries: 0 })('prompt'),
    (error: unknown) => error instanceof ImageGenError && error.code === 'NETWORK' && error.isRetryable
  )
  assert.equal(calls(), 1)
})

test('other API failures are reported as UNKNOWN with the cause kept', async () => {
  const cause = Object.assign(new Error('permission denied'), { status: 403 })
  const { client, calls } = clientThrowing(cause)

  await assert.rejects(
    createGeminiImageGenerator(client, { model: 'm' })('prompt'),
    (error: unknown) => error instanceof ImageGenError &&
      error.code === 'UNKNOWN' &&
      error.message === 'permission denied' &&
      error.context instanceof GeminiError
  )
  assert.equal(calls(), 1)
})

test('deadline overruns map to TIMEOUT', () => {
  const mapped = toImageGenError(new GeminiError('Request timed out after 10ms', 'TIMEOUT', false))
  assert.equal(mapped.code, 'TIMEOUT')
  assert.equal(mapped.message, 'Request timed out after 10ms')

  const blocked = new ImageGenError('blocked', 'SAFETY_BLOCKED', false)
  assert.equal(toImageGenError(blocked), blocked)
})
