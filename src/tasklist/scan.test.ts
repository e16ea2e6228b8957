import { describe, expect, it } from 'vitest';
import {
  findNextTasklistBlock,
  isClosingFenceLine,
  isOpeningFenceLine,
  listTasklistBlocks,
  scanTasklistBlocks,
} from './scan.js';

describe('fence lines', () => {
  it('accepts surrounding spaces and tabs', () => {
    expect(isOpeningFenceLine('```[tasklist]')).toBe(true);
    expect(isOpeningFenceLine('  \t```[tasklist] \t')).toBe(true);
    expect(isClosingFenceLine('```')).toBe(true);
    expect(isClosingFenceLine('\t```  ')).toBe(true);
  });

  it('rejects other text on the line', () => {
    expect(isOpeningFenceLine('text ```[tasklist]')).toBe(false);
    expect(isOpeningFenceLine('```[tasklist] extra')).toBe(false);
    expect(isOpeningFenceLine('```[Tasklist]')).toBe(false);
    expect(isOpeningFenceLine('````[tasklist]')).toBe(false);
    expect(isClosingFenceLine('```js')).toBe(false);
    expect(isClosingFenceLine('````')).toBe(false);
  });
});

describe('scanTasklistBlocks', () => {
  it('finds a block spanning the whole document', () => {
    const text = '```[tasklist]\n- [ ] a\n- [ ] b\n```\n';
    expect(listTasklistBlocks(text)).toEqual([
      {
        index: 0,
        start: 0,
        end: 34,
        line: 0,
        outer: text,
        inner: '- [ ] a\n- [ ] b\n',
      },
    ]);
  });

  it('records offsets and line of an indented block', () => {
    const text = 'Intro\n\n  ```[tasklist]\t\n- [ ] x\n```  \nOutro\n';
    const [block] = listTasklistBlocks(text);
    expect(block?.start).toBe(7);
    expect(block?.line).toBe(2);
    expect(block?.outer).toBe('  ```[tasklist]\t\n- [ ] x\n```  \n');
    expect(block?.inner).toBe('- [ ] x\n');
    expect(text.slice(block?.start, block?.end)).toBe(block?.outer);
  });

  it('accepts CRLF line endings', () => {
    const text = 'a\r\n```[tasklist]\r\n- [ ] x\r\n```\r\nb\r\n';
    const [block] = listTasklistBlocks(text);
    expect(block?.outer).toBe('```[tasklist]\r\n- [ ] x\r\n```\r\n');
    expect(block?.inner).toBe('- [ ] x\r\n');
  });

  it('yields nothing for documents without blocks', () => {
    expect(listTasklistBlocks('')).toEqual([]);
    expect(listTasklistBlocks('# Title\n\n```js\nconst a = 1;\n```\n')).toEqual([]);
    expect(listTasklistBlocks('plain text\n')).toEqual([]);
  });

  it('ignores a fence that does not start the line', () => {
    expect(listTasklistBlocks('text ```[tasklist]\n- [ ] x\n```\n')).toEqual([]);
  });

  it('ignores an opening fence that is never closed', () => {
    expect(listTasklistBlocks('```[tasklist]\n- [ ] x\n')).toEqual([]);
    expect(listTasklistBlocks('```[tasklist]')).toEqual([]);
  });

  it('stops at the first closing fence', () => {
    const text = '```[tasklist]\n- a\n```\nmiddle\n```\n';
    const blocks = listTasklistBlocks(text);
    expect(blocks).toHaveLength(1);
    expect(blocks[0]?.outer).toBe('```[tasklist]\n- a\n```\n');
    expect(blocks[0]?.inner).toBe('- a\n');
  });

  it('keeps fences with an info string inside the block', () => {
    const [block] = listTasklistBlocks('```[tasklist]\n```js\nx\n```\n');
    expect(block?.inner).toBe('```js\nx\n');
  });

  it('treats a nested opening fence as inner content', () => {
    const text = '```[tasklist]\n```[tasklist]\n- a\n```\n```\n';
    const blocks = listTasklistBlocks(text);
    expect(blocks).toHaveLength(1);
    expect(blocks[0]?.inner).toBe('```[tasklist]\n- a\n');
  });

  it('handles an empty block and a closing fence at end of text', () => {
    expect(listTasklistBlocks('```[tasklist]\n```\n')[0]?.inner).toBe('');

    const text = '```[tasklist]\n- a\n```';
    const [block] = listTasklistBlocks(text);
    expect(block?.outer).toBe(text);
    expect(block?.end).toBe(text.length);
    expect(block?.inner).toBe('- a\n');
  });

  it('yields blocks in document order with increasing indexes', () => {
    const text = '```[tasklist]\n- a\n```\ntext\n```[tasklist]\n- b\n```\n';
    const blocks = [...scanTasklistBlocks(text)];
    expect(blocks.map((block) => [block.index, block.line, block.inner])).toEqual([
      [0, 0, '- a\n'],
      [1, 4, '- b\n'],
    ]);
    expect(blocks[0]?.end).toBe(22);
    expect(blocks[1]?.start).toBe(27);
  });

  it('keeps identical blocks apart by position', () => {
    const block = '```[tasklist]\n- [ ] same\n```\n';
    const blocks = listTasklistBlocks(`${block}${block}`);
    expect(blocks.map((b) => b.start)).toEqual([0, block.length]);
    expect(blocks[0]?.outer).toBe(blocks[1]?.outer);
  });

  it('scans lazily', () => {
    const iterator = scanTasklistBlocks('```[tasklist]\n- a\n```\n```[tasklist]\n- b\n```\n');
    const first = iterator.next();
    expect(first.done ? undefined : first.value.inner).toBe('- a\n');
    const second = iterator.next();
    expect(second.done ? undefined : second.value.inner).toBe('- b\n');
    expect(iterator.next().done).toBe(true);
  });
});

describe('findNextTasklistBlock', () => {
  const text = '```[tasklist]\n- a\n```\ntext\n```[tasklist]\n- b\n```\n';

  it('returns the first block at or after the offset', () => {
    expect(findNextTasklistBlock(text)?.inner).toBe('- a\n');
    expect(findNextTasklistBlock(text, 0)?.start).toBe(0);
    const second = findNextTasklistBlock(text, 22);
    expect(second?.start).toBe(27);
    expect(second?.index).toBe(1);
    expect(second?.line).toBe(4);
  });

  it('skips a block that starts before the offset', () => {
    expect(findNextTasklistBlock(text, 1)?.start).toBe(27);
    expect(findNextTasklistBlock(text, 28)).toBeUndefined();
  });

  it('returns undefined without blocks', () => {
    expect(findNextTasklistBlock('plain\n')).toBeUndefined();
  });
});
