import { describe, it, expect } from 'vitest'
import { parseToolCommands } from '../toolCommands.js'

describe('parseToolCommands', () => {
  it('resolves known tools into commands', () => {
    const commands = parseToolCommands([
      { tool: 'update_user_profile', data: { name: 'Ana', age: 31, vegetarian: true }, reason: 'user introduction' },
      { tool: 'add_short_term_memory', content: ' Ana has a cat ', category: 'user', importance: 'high' },
    ])

    expect(commands).toEqual([
      {
        tool: 'update_user_profile',
        data: { name: 'Ana', age: '31', vegetarian: 'true' },
        reason: 'user introduction',
      },
      { tool: 'add_short_term_memory', content: 'Ana has a cat', category: 'user', importance: 'high', reason: '' },
    ])
  })

  it('drops unknown tools and malformed calls', () => {
    expect(
      parseToolCommands([
        { tool: 'send_email', data: { to: 'someone' } },
        { tool: 'update_soul' },
        { tool: 'add_short_term_memory', content: '   ' },
        'update_preferences',
        null,
      ])
    ).toEqual([])
  })

  it('falls back to default category and importance', () => {
    expect(parseToolCommands([{ tool: 'add_short_term_memory', content: 'note', category: 'misc', importance: 9 }])).toEqual([
      { tool: 'add_short_term_memory', content: 'note', category: 'chat', importance: 'normal', reason: '' },
    ])
  })

  it('returns nothing for a non-array', () => {
    expect(parseToolCommands({ tool: 'update_soul', data: {} })).toEqual([])
  })
})
