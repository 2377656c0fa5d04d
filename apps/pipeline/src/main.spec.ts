import { parseCommand } from './main';

describe('parseCommand', () => {
  it('defaults to run', () => {
    expect(parseCommand([])).toBe('run');
  });

  it('accepts known commands case-insensitively', () => {
    expect(parseCommand(['schedule'])).toBe('schedule');
    expect(parseCommand(['LATEST'])).toBe('latest');
  });

  it('rejects anything else', () => {
    expect(parseCommand(['deploy'])).toBeNull();
  });
});
