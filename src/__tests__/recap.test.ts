import { extractRecap, formatRecapBlock, heuristicRecap, normalizeThreadId, parseRecapJson } from '../utils/recap.js';

describe('recap block parsing', () => {
  it('splits the body from a trailing recap block', () => {
    const text = [
      'Harry opened the door.',
      '',
      '[RECAP]',
      '{"summary": "Harry found the hidden vault. It was empty.", "characters": {"Harry Potter": "inside the vault"}, "openedThreads": [{"id": "The Hidden Vault", "description": "Who built it?"}], "resolvedThreads": ["Lost Key"]}',
      '[/RECAP]',
    ].join('\n');

    const { body, recap } = extractRecap(text);

    expect(body).toBe('Harry opened the door.');
    expect(recap).toEqual({
      summary: 'Harry found the hidden vault. It was empty.',
      characters: { 'Harry Potter': 'inside the vault' },
      openedThreads: [{ id: 'the-hidden-vault', description: 'Who built it?' }],
      resolvedThreads: ['lost-key'],
    });
  });

  it('returns a null recap when the block is missing', () => {
    expect(extractRecap('  Just prose.  ')).toEqual({ body: 'Just prose.', recap: null });
  });

  it('drops a malformed block from the body', () => {
    const { body, recap } = extractRecap('Prose here.\n[RECAP]\nnot json at all\n[/RECAP]');
    expect(body).toBe('Prose here.');
    expect(recap).toBeNull();
  });

  it('round-trips a formatted block', () => {
    const recap = {
      summary: 'Ron lost his wand in the lake. Nobody saw it sink.',
      characters: { 'Ron Weasley': 'without a wand' },
      openedThreads: [],
      resolvedThreads: [],
    };
    expect(extractRecap(`Text.\n\n${formatRecapBlock(recap)}`).recap).toEqual(recap);
  });

  it('parses recap JSON wrapped in fences and prose', () => {
    const raw = 'Here you go:\n```json\n{"summary": "Hermione solved the riddle. The door opened."}\n```';
    expect(parseRecapJson(raw)).toEqual({
      summary: 'Hermione solved the riddle. The door opened.',
      characters: {},
      openedThreads: [],
      resolvedThreads: [],
    });
  });

  it('rejects a recap with a too short summary', () => {
    expect(parseRecapJson('{"summary": "Short"}')).toBeNull();
  });

  it('requires two to four summary sentences', () => {
    expect(parseRecapJson('{"summary": "Harry found the hidden vault."}')).toBeNull();
    expect(parseRecapJson('{"summary": "One. Two! Three? Four. Five."}')).toBeNull();
    expect(parseRecapJson('{"summary": "Harry ran. Ron hid. Hermione read. Neville slept."}')?.summary).toBe(
      'Harry ran. Ron hid. Hermione read. Neville slept.'
    );
  });

  it('normalizes thread ids', () => {
    expect(normalizeThreadId('  The Dark Mark! ')).toBe('the-dark-mark');
  });
});

describe('heuristicRecap', () => {
  it('uses the closing sentences and the known characters mentioned', () => {
    const body = 'Harry ran. Hermione followed. They hid. Ron waited.';
    expect(heuristicRecap(body, 4, ['Harry', 'Hermione', 'Draco'])).toEqual({
      summary: 'Hermione followed. They hid. Ron waited.',
      characters: {
        Harry: 'appeared in chapter 4',
        Hermione: 'appeared in chapter 4',
      },
      openedThreads: [],
      resolvedThreads: [],
    });
  });

  it('keeps a character named like an object built-in as a plain key', () => {
    const { characters } = heuristicRecap('The __proto__ rune glowed.', 2, ['__proto__']);
    expect(Object.keys(characters)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(characters)).toBe(Object.prototype);
  });

  it('falls back to a generic summary for empty text', () => {
    expect(heuristicRecap('', 7, []).summary).toBe('Chapter 7 continues the story.');
  });
});
