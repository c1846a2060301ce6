/**
 * End-to-end requests through createRuntime with a scripted completion
 * service, an in-memory long-term index and a manual clock
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createRuntime, type CognitiveRuntime, type RuntimeOptions } from '../createRuntime.js'
import { DEGRADED_REPLY } from '../cognitivePipeline.js'
import { createInMemoryPersistence } from '../../memory/shortTermStore.js'
import type { RequestDonePayload } from '../../shared/events/runtimeEvents.js'
import type { ConsolidationRecord } from '../../memory/types.js'
import {
  createManualClock,
  hangUntilAborted,
  InMemoryLongTermStore,
  json,
  makeEntry,
  makeTempDir,
  removeDir,
  ScriptedCompletionService,
} from '../../../tests/helpers/fakes.js'
import { INPUT, REPLY, happyPathReplies, testConfig } from '../../../tests/helpers/stageFixtures.js'

describe('cognitive runtime', () => {
  let dataDir: string
  let completion: ScriptedCompletionService
  let longTerm: InMemoryLongTermStore
  let runtime: CognitiveRuntime | undefined

  function build(options: Partial<RuntimeOptions> = {}): CognitiveRuntime {
    runtime = createRuntime({
      config: testConfig(),
      dataDir,
      completion,
      longTerm,
      clock: createManualClock().clock,
      ...options,
    })
    return runtime
  }

  beforeEach(() => {
    dataDir = makeTempDir()
    completion = new ScriptedCompletionService(happyPathReplies())
    longTerm = new InMemoryLongTermStore()
    runtime = undefined
  })

  afterEach(async () => {
    await runtime?.shutdown()
    removeDir(dataDir)
  })

  describe('happy path', () => {
    it('answers, applies foreground effects, then background effects', async () => {
      const rt = build()
      const response = await rt.respond(INPUT)

      expect(response.status).toBe('ok')
      expect(response.reply).toBe(REPLY)
      expect(response.strategy).toBe('conversational')
      expect(response.degradedStages).toEqual([])
      expect(response.classification.inputType).toBe('emotional')
      expect(response.states).toEqual([
        'CLASSIFYING',
        'PARALLEL_ANALYSIS',
        'SYNTHESIZING',
        'RESPONDED',
        'BACKGROUND_PROCESSING',
      ])
      expect(response.emotions.happiness).toBeCloseTo(0.57, 10)
      expect(response.emotions.motivation).toBe(0.8)

      const facts = rt.getActiveShortTerm()
      expect(facts.map(e => e.content)).toEqual(['User went to a jazz concert'])
      expect(facts[0]?.importance).toBe('normal')

      await rt.drainBackground()

      expect(rt.getEmotionalSnapshot().motivation).toBeCloseTo(0.83, 10)
      const notes = rt.getPersonalityNotes()
      expect(notes.user).toEqual([
        { key: 'music', value: 'likes jazz', source: 'archivist', at: '2025-03-01T00:00:00.000Z' },
      ])
      expect(notes.preferences).toEqual([
        { key: 'genre', value: 'jazz', source: 'tool:update_preferences', at: '2025-03-01T00:00:00.000Z' },
      ])
      expect(notes.soul).toEqual([])
    })

    it('runs the stages in pipeline order', async () => {
      await build().respond(INPUT)
      await runtime?.drainBackground()

      const stages = completion.calls.map(c => c.stage)
      expect(stages.slice(0, 1)).toEqual(['classifier'])
      expect([...stages.slice(1, 3)].sort()).toEqual(['affect', 'recall'])
      expect(stages[3]).toBe('synthesis')
      expect([...stages.slice(4)].sort()).toEqual(['archivist', 'reward', 'toolDecider'])
    })

    it('emits every state change and a done event', async () => {
      const rt = build()
      const states: string[] = []
      const done: RequestDonePayload[] = []
      rt.events.on('request:state', p => states.push(p.state))
      rt.events.on('request:done', p => done.push(p))

      const response = await rt.respond(INPUT)
      await rt.drainBackground()

      expect(states).toEqual([...response.states, 'DONE'])
      expect(done).toEqual([{ requestId: response.requestId, failedStages: [], durationMs: 0 }])
    })

    it('passes earlier exchanges to the next request', async () => {
      const rt = build()
      await rt.respond(INPUT)
      await rt.respond('Who was playing?')

      const secondPrompt = completion.callsFor('classifier')[1]?.prompt ?? ''
      expect(secondPrompt).toContain(`User: ${INPUT}\nAssistant: ${REPLY}`)
      expect(secondPrompt).toContain('Message: Who was playing?')
    })

    it('keeps no history when the window is 0', async () => {
      const rt = build({ config: testConfig({ pipeline: { historyWindow: 0 } }) })
      await rt.respond(INPUT)
      await rt.respond('Who was playing?')
      await rt.respond('Hello', { history: [{ user: 'Earlier', assistant: 'Reply' }] })

      const [, second, third] = completion.callsFor('classifier').map(c => c.prompt)
      expect(second).toBe(
        'Recent conversation:\n(no previous messages)\n\nMessage: Who was playing?'
      )
      expect(third).toBe('Recent conversation:\n(no previous messages)\n\nMessage: Hello')
    })

    it('keeps only the last turns inside the window', async () => {
      const rt = build({ config: testConfig({ pipeline: { historyWindow: 1 } }) })
      await rt.respond(INPUT)
      await rt.respond('Who was playing?')
      await rt.respond('Hello')

      const third = completion.callsFor('classifier')[2]?.prompt
      expect(third).toBe(
        `Recent conversation:\nUser: Who was playing?\nAssistant: ${REPLY}\n\nMessage: Hello`
      )
    })

    it('uses explicit history instead of its own when given', async () => {
      const rt = build()
      await rt.respond(INPUT)
      await rt.respond('Hello', { history: [{ user: 'Earlier', assistant: 'Reply' }] })

      const prompt = completion.callsFor('classifier')[1]?.prompt ?? ''
      expect(prompt).toContain('User: Earlier\nAssistant: Reply')
      expect(prompt).not.toContain(INPUT)
    })
  })

  describe('degraded requests', () => {
    it('answers without Affect when it times out', async () => {
      completion.setDefault('affect', hangUntilAborted)
      const rt = build({ config: testConfig({ pipeline: { stageTimeoutMs: { affect: 50 } } }) })

      const response = await rt.respond(INPUT)

      expect(response.status).toBe('degraded')
      expect(response.degradedStages).toEqual(['affect'])
      expect(response.reply).toBe(REPLY)
      expect(response.emotions.happiness).toBe(0.52)
      expect(completion.callsFor('synthesis')[0]?.prompt).toContain('Emotional read: unavailable')
      expect(rt.getActiveShortTerm()).toHaveLength(1)
    })

    it('bounds the parallel phase by the join timeout', async () => {
      completion.setDefault('recall', hangUntilAborted)
      const rt = build({ config: testConfig({ pipeline: { parallelJoinTimeoutMs: 30 } }) })

      const response = await rt.respond(INPUT)

      expect(response.degradedStages).toEqual(['recall'])
      expect(response.reply).toBe(REPLY)
      expect(rt.getActiveShortTerm()).toEqual([])
    })

    it('falls back to a default classification', async () => {
      completion.setDefault('classifier', 'no idea')
      const response = await build().respond(INPUT)

      expect(response.status).toBe('degraded')
      expect(response.degradedStages).toEqual(['classifier'])
      expect(response.classification).toMatchObject({ inputType: 'conversation', language: 'en' })
      expect(response.reply).toBe(REPLY)
    })

    it('sends a fixed reply when Synthesis fails', async () => {
      completion.setDefault('synthesis', json({ reply: '' }))
      const response = await build().respond(INPUT)

      expect(response.status).toBe('degraded')
      expect(response.degradedStages).toEqual(['synthesis'])
      expect(response.reply).toBe(DEGRADED_REPLY)
      expect(response.strategy).toBeNull()
      expect(response.emotions.happiness).toBeCloseTo(0.55, 10)
    })

    it('reports failed background stages without touching the reply', async () => {
      completion.setDefault('reward', { error: { type: 'unavailable', message: 'down' } })
      const rt = build()
      const done: RequestDonePayload[] = []
      rt.events.on('request:done', p => done.push(p))

      const response = await rt.respond(INPUT)
      await rt.drainBackground()

      expect(response.status).toBe('ok')
      expect(done[0]?.failedStages).toEqual(['reward'])
      expect(rt.getEmotionalSnapshot().motivation).toBe(0.8)
      expect(rt.getPersonalityNotes().user).toHaveLength(1)
    })
  })

  describe('memory effects', () => {
    it('raises recall writes to high importance on a strong memory boost', async () => {
      completion.setDefault(
        'affect',
        json({ primary_emotion: 'joy', memory_boost_factor: 2.5, emotions_update: {} })
      )
      const rt = build()
      await rt.respond(INPUT)

      expect(rt.getActiveShortTerm()[0]?.importance).toBe('high')
    })

    it('reinforces short-term entries the input mentions again', async () => {
      const rt = build({
        shortTermPersistence: createInMemoryPersistence([
          makeEntry({ id: 'concert', content: 'I just got back from a jazz concert downtown' }),
        ]),
      })
      await rt.respond(INPUT)

      const concert = rt.getActiveShortTerm().find(e => e.id === 'concert')
      expect(concert?.reinforcementCount).toBe(1)
    })

    it('runs a consolidation cycle after the interaction threshold', async () => {
      const rt = build({
        config: testConfig({ consolidation: { enabled: true, interactionThreshold: 1 } }),
      })
      const cycles: ConsolidationRecord[] = []
      rt.events.on('consolidation:completed', r => cycles.push(r))

      await rt.respond(INPUT)
      await rt.drainBackground()

      expect(cycles).toHaveLength(1)
      expect(cycles[0]).toMatchObject({ trigger: 'interactions', entriesScanned: 1, entriesPromoted: 0 })
      expect(rt.getConsolidationHistory()).toEqual(cycles)
      expect(rt.getStatus().consolidation.interactionsSinceCycle).toBe(0)
    })

    it('consolidates on demand', async () => {
      const rt = build()
      await rt.respond(INPUT)

      const record = await rt.triggerConsolidation()
      expect(record).toMatchObject({ trigger: 'manual', entriesScanned: 1, entriesEvicted: 0 })
    })
  })

  describe('status and shutdown', () => {
    it('summarises the runtime', async () => {
      const rt = build()
      await rt.respond(INPUT)
      await rt.drainBackground()

      const status = rt.getStatus()
      expect(status.requestsProcessed).toBe(1)
      expect(status.shortTermEntries).toBe(1)
      expect(status.background).toMatchObject({ completed: 1, failed: 0, stopped: false })
      expect(status.consolidation).toMatchObject({
        interactionsSinceCycle: 1,
        nextTrigger: 'disabled',
        phase: 'IDLE',
      })
    })

    it('still answers after shutdown but skips background work', async () => {
      const rt = build()
      await rt.shutdown()
      const done: RequestDonePayload[] = []
      rt.events.on('request:done', p => done.push(p))

      const response = await rt.respond(INPUT)

      expect(response.reply).toBe(REPLY)
      expect(done[0]?.failedStages).toEqual(['reward', 'archivist', 'toolDecider'])
      expect(completion.callsFor('reward')).toEqual([])
      expect(rt.getStatus().background.stopped).toBe(true)
    })

    it('keeps emotional state across restarts of the same data dir', async () => {
      await build().respond(INPUT)
      await runtime?.shutdown()

      const restarted = build()
      expect(restarted.getEmotionalSnapshot().happiness).toBeCloseTo(0.57, 10)
      expect(restarted.getActiveShortTerm()).toHaveLength(1)
    })
  })
})
