import { describe, expect, it } from 'vitest';
import { OutputBuffer } from './output-buffer.js';

describe('OutputBuffer', () => {
  it('starts empty', () => {
    const buffer = new OutputBuffer();

    expect(buffer.snapshot()).toBe('');
    expect(buffer.length).toBe(0);
    expect(buffer.chunks()).toEqual([]);
  });

  it('concatenates chunks in arrival order', () => {
    const buffer = new OutputBuffer();
    buffer.append('stdout', 'a');
    buffer.append('stderr', 'b');
    buffer.append('stdout', 'c');

    expect(buffer.snapshot()).toBe('abc');
    expect(buffer.length).toBe(3);
  });

  it('separates the streams', () => {
    const buffer = new OutputBuffer();
    buffer.append('stdout', 'out1 ');
    buffer.append('stderr', 'err');
    buffer.append('stdout', 'out2');

    expect(buffer.text('stdout')).toBe('out1 out2');
    expect(buffer.text('stderr')).toBe('err');
  });

  it('ignores empty text', () => {
    const buffer = new OutputBuffer();
    buffer.append('stdout', '');

    expect(buffer.chunks()).toEqual([]);
  });

  it('returns a copy of its chunks', () => {
    const buffer = new OutputBuffer();
    buffer.append('stdout', 'x');
    const chunks = buffer.chunks();
    buffer.append('stdout', 'y');

    expect(chunks).toEqual([{ source: 'stdout', text: 'x' }]);
    expect(buffer.chunks()).toHaveLength(2);
  });
});
