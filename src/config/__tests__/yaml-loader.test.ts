import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadConfigFile, loadStateFile } from '../yaml-loader';

const FIXTURES = path.resolve(__dirname, '../../..', 'tests/__fixtures__');

describe('yaml loader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cursor-extract-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeTmp(name: string, contents: string): string {
    const filePath = path.join(tmpDir, name);
    fs.writeFileSync(filePath, contents, 'utf-8');
    return filePath;
  }

  describe('loadConfigFile', () => {
    it('should load and validate a YAML config', async () => {
      const config = await loadConfigFile(path.join(FIXTURES, 'connector.yaml'), {});

      expect(config.startDate).toBe('2024-01-01');
      expect(config.pageSize).toBe(500);
      expect(config.interPageDelayMs).toBe(0);
      expect(config.streams.map((stream) => stream.name)).toEqual(['users', 'orders']);
    });

    it('should load JSON configs', async () => {
      const filePath = writeTmp(
        'config.json',
        JSON.stringify({
          api_token: 'test-secret',
          endpoints: [{ name: 'users', endpoint_url: 'https://api.example.com/users' }]
        })
      );

      const config = await loadConfigFile(filePath, {});

      expect(config.apiToken).toBe('test-secret');
    });

    it('should report a missing file', async () => {
      const filePath = path.join(tmpDir, 'absent.yaml');

      await expect(loadConfigFile(filePath, {})).rejects.toThrow(`Configuration error: Missing file: ${filePath}`);
    });

    it('should report unparseable YAML', async () => {
      const filePath = writeTmp('broken.yaml', 'api_token: [unclosed\n');

      await expect(loadConfigFile(filePath, {})).rejects.toThrow(`Failed to parse ${filePath}`);
    });

    it('should report invalid content', async () => {
      const filePath = writeTmp('invalid.yaml', 'api_token: test-secret\nendpoints: []\n');

      await expect(loadConfigFile(filePath, {})).rejects.toThrow('Missing required fields: endpoints');
    });
  });

  describe('loadStateFile', () => {
    it('should return empty state without a path', async () => {
      await expect(loadStateFile()).resolves.toEqual({});
    });

    it('should return empty state for an empty file', async () => {
      await expect(loadStateFile(writeTmp('state.json', ''))).resolves.toEqual({});
    });

    it('should load per-stream marks', async () => {
      const state = await loadStateFile(path.join(FIXTURES, 'state.json'));

      expect(state).toEqual({
        users: { updatedAt: '2024-01-16T08:30:00.000Z' },
        archived: { updatedAt: '2023-06-01T00:00:00.000Z' }
      });
    });

    it('should reject malformed state', async () => {
      const filePath = writeTmp('state.json', '{"users": {"updatedAt": 5}}');

      await expect(loadStateFile(filePath)).rejects.toThrow(`Invalid state in ${filePath}`);
    });
  });
});
