import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Logger, silentLogger } from './logger.js';

function capture(): { lines: string[]; sink: (line: string) => void } {
  const lines: string[] = [];
  return { lines, sink: (line: string) => lines.push(line) };
}

function parseLine(lines: string[], index: number): Record<string, unknown> {
  const line = lines[index];
  if (line === undefined) {
    throw new Error(`Expected output at index ${String(index)} but got undefined`);
  }
  return JSON.parse(line.trim()) as Record<string, unknown>;
}

describe('Logger', () => {
  it('writes one JSON line per entry with component and event', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ component: 'Planner', sink });

    logger.info('question_selected', { questionId: 'languages' });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.endsWith('\n')).toBe(true);
    const parsed = parseLine(lines, 0);
    expect(parsed.level).toBe('info');
    expect(parsed.component).toBe('Planner');
    expect(parsed.event).toBe('question_selected');
    expect(parsed.data).toEqual({ questionId: 'languages' });
    expect(typeof parsed.timestamp).toBe('string');
  });

  it('omits data when none is given', () => {
    const { lines, sink } = capture();
    new Logger({ component: 'Loop', sink }).warn('no_data');

    expect(parseLine(lines, 0)).not.toHaveProperty('data');
  });

  it('drops debug entries unless debug mode is enabled', () => {
    const { lines, sink } = capture();
    new Logger({ component: 'Loop', sink }).debug('hidden');
    new Logger({ component: 'Loop', sink, debugMode: true }).debug('shown');

    expect(lines).toHaveLength(1);
    expect(parseLine(lines, 0).event).toBe('shown');
  });

  it('child loggers share sink and debug mode', () => {
    const { lines, sink } = capture();
    const child = new Logger({ component: 'Cli', sink, debugMode: true }).child('Renderer');

    expect(child.isDebugEnabled).toBe(true);
    child.debug('rendering');
    expect(parseLine(lines, 0).component).toBe('Renderer');
  });

  it('degrades circular data to a serialization error entry', () => {
    const { lines, sink } = capture();
    const circular: Record<string, unknown> = { name: 'test' };
    circular.self = circular;

    expect(() => {
      new Logger({ component: 'Test', sink }).error('circular', circular);
    }).not.toThrow();

    const parsed = parseLine(lines, 0);
    expect(parsed.event).toBe('circular');
    expect(typeof parsed.serializationError).toBe('string');
    expect(parsed.originalData).toBe('[unserializable]');
  });

  it('silentLogger writes nothing', () => {
    expect(() => {
      silentLogger.error('ignored', { reason: 'test' });
    }).not.toThrow();
  });

  it('always produces parseable JSON for string data', () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), (event, value) => {
        const { lines, sink } = capture();
        new Logger({ component: 'Prop', sink }).info(event, { value });
        const parsed = parseLine(lines, 0);
        return parsed.event === event && (parsed.data as { value: string }).value === value;
      })
    );
  });
});
