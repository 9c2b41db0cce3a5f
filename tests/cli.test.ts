import { main } from '../src/cli';

describe('cli', () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    log.mockRestore();
  });

  it('should run a full simulation with the clamped capacity', async () => {
    await main(['250000']);

    const lines = log.mock.calls.map(call => call[0]);
    expect(lines[0]).toBe('queue capacity: 100000');
    expect(lines[1]).toMatch(/^Monitor: producer done and queue empty at \d+ ns$/);
    expect(lines).toContain('total items transferred: 10000');
    expect(lines).toHaveLength(8);
  }, 30000);

  it('should print burst and stall lines when BURSTLINE_VERBOSE is 1', async () => {
    process.env.BURSTLINE_VERBOSE = '1';
    try {
      await main(['100000']);
    } finally {
      delete process.env.BURSTLINE_VERBOSE;
    }

    const lines: string[] = log.mock.calls.map(call => call[0]);
    expect(lines[0]).toBe('queue capacity: 100000');
    expect(lines.some(line => /^0 ns producer wrote burst of \d+, \d+ left$/.test(line))).toBe(true);
    expect(lines.some(line => /^\d+ ns queue empty, consumer blocked$/.test(line))).toBe(true);
  }, 30000);

  it('should fall back to the default capacity', async () => {
    await main(['not-a-number']);

    expect(log).toHaveBeenNthCalledWith(1, 'queue capacity: 10');
  }, 30000);
});
