import { describe, it, expect } from 'vitest';
import { scanText } from '../../src/guardrails/patterns.js';

const ids = (text: string): string[] => scanText(text).map(match => match.pattern.id);

describe('scanText', () => {
  it('finds a bare eval call', () => {
    expect(scanText('result = eval("1+1")')).toEqual([
      expect.objectContaining({ match: 'eval(' }),
    ]);
    expect(ids('result = eval("1+1")')).toEqual(['eval-call']);
  });

  it('ignores method calls that share a dangerous name', () => {
    expect(ids('const found = pattern.exec(text);')).toEqual([]);
    expect(ids('model.eval()')).toEqual([]);
  });

  it('reports each pattern once, in table order', () => {
    expect(ids('import subprocess\nsubprocess.run(["ls"])')).toEqual(['subprocess', 'python-process-import']);
    expect(ids('eval(a); eval(b)')).toEqual(['eval-call']);
  });

  it('flags network libraries', () => {
    expect(ids('requests.get("https://example.com")')).toEqual(['python-network']);
  });

  it('flags hard-coded secrets', () => {
    const [match] = scanText('password = "test-secret"');
    expect(match?.pattern.id).toBe('secret-assignment');
    expect(match?.match).toBe('password = "test-secret"');
  });

  it('blocks opening an absolute path but not a relative one', () => {
    expect(scanText('open("/etc/passwd")').map(m => m.pattern.severity)).toEqual(['block']);
    expect(ids('with open("notes.txt") as f:')).toEqual([]);
  });

  it('only warns about plain path handling', () => {
    const matches = scanText('full = os.path.join(a, b)');
    expect(matches.map(m => [m.pattern.id, m.pattern.severity])).toEqual([['path-access', 'warning']]);
  });

  it('finds nothing in ordinary code', () => {
    expect(ids('def add(a, b):\n    return a + b\n')).toEqual([]);
  });
});
