import { stripVTControlCharacters } from 'node:util';

interface ConsoleSpy {
  mock: { calls: unknown[][] };
}

/**
 * Everything written through a console spy, colours removed
 */
export function captured(spy: ConsoleSpy): string {
  return stripVTControlCharacters(spy.mock.calls.map((args) => args.map(String).join(' ')).join('\n'));
}

export function capturedJson(spy: ConsoleSpy): unknown {
  return JSON.parse(captured(spy));
}
