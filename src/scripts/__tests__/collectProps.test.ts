import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { main } from '../collectProps';
import {
  FIXED_NOW,
  TEST_API_KEY,
  TEST_MARKET,
  TEST_SPORT,
  eventFixture,
  jsonResponse,
  oddsApiStub,
  twoBookPointsPayload,
} from '../../__tests__/fixtures';

const BASE_URL = 'https://odds.test/v4';

describe('collectProps main()', () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'props-cli-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const env = (overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv => ({
    THE_ODDS_API_KEY: TEST_API_KEY,
    ODDS_SPORTS: TEST_SPORT,
    ODDS_MARKETS: TEST_MARKET,
    ...overrides,
  });

  it('exits 1 without any request when the key is missing', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch');

    const exitCode = await main(env({ THE_ODDS_API_KEY: undefined }), { cwd: dir });

    expect(exitCode).toBe(1);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Collection failed (AuthError)')
    );
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('exits 0 and writes all three outputs on success', async () => {
    vi.spyOn(globalThis, 'fetch').mockImplementation(
      oddsApiStub([eventFixture()], { 'evt-1': twoBookPointsPayload() })
    );

    const exitCode = await main(env(), { cwd: dir, now: () => FIXED_NOW, baseUrl: BASE_URL });

    expect(exitCode).toBe(0);
    expect(fs.readdirSync(dir).sort()).toEqual(['index.html', 'odds.db', 'player_props.xlsx']);
  });

  it('exits 1 when the quota is exhausted', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ message: 'Usage quota has been reached.' }, 429)
    );

    const exitCode = await main(env(), { cwd: dir, now: () => FIXED_NOW, baseUrl: BASE_URL });

    expect(exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Collection failed (QuotaExceeded)')
    );
    expect(fs.existsSync(path.join(dir, 'index.html'))).toBe(false);
  });
});
