import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { applyCommandOverrides, checkCommand, getFilesToAnalyze, isTypeScriptFile } from '../../src/cli/commands/check';
import { DEFAULT_DETECTOR_CONFIG } from '../../src/analyzers/required-param-detector';
import { Logger } from '../../src/utils/cli-utils';
import type { CommandEnvironment } from '../../src/types/environment';
import type { ParamguardConfig } from '../../src/types/required-params';

const SERVICE_SOURCE = [
  'export function connect({ host }: Options) {',
  '  assert(host != null);',
  '}',
  ''
].join('\n');

function defaults(): ParamguardConfig {
  return {
    ...DEFAULT_DETECTOR_CONFIG,
    include: [...DEFAULT_DETECTOR_CONFIG.include],
    exclude: [...DEFAULT_DETECTOR_CONFIG.exclude]
  };
}

describe('check command', () => {
  let tempDir: string;

  function writeFile(relativePath: string, content = ''): string {
    const filePath = path.join(tempDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'paramguard-check-')));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('applyCommandOverrides', () => {
    it('resolves --tsconfig and splits --assert', () => {
      const config = applyCommandOverrides(defaults(), { tsconfig: 'tsconfig.lint.json', assert: 'check, ensure,' }, '/repo');

      expect(config.tsconfigPath).toBe(path.resolve('/repo', 'tsconfig.lint.json'));
      expect(config.assertionFunctions).toEqual(['check', 'ensure']);
    });

    it('leaves the config alone without overrides', () => {
      const base = defaults();

      const config = applyCommandOverrides(base, { assert: ' , ' }, '/repo');

      expect(config).toEqual(base);
      expect(config).not.toBe(base);
    });
  });

  describe('isTypeScriptFile', () => {
    it('accepts sources and rejects declaration files of every flavour', () => {
      expect(['a.ts', 'a.tsx', 'a.mts', 'a.cts'].map(isTypeScriptFile)).toEqual([true, true, true, true]);
      expect(['a.d.ts', 'a.d.mts', 'a.d.cts', 'a.js'].map(isTypeScriptFile)).toEqual([false, false, false, false]);
    });
  });

  describe('getFilesToAnalyze', () => {
    it('uses the include and exclude patterns when no paths are given', async () => {
      const a = writeFile('src/a.ts');
      const b = writeFile('src/nested/b.tsx');
      writeFile('src/types.d.ts');
      writeFile('src/node_modules/pkg/index.ts');
      writeFile('scripts/tool.ts');

      expect(await getFilesToAnalyze([], defaults(), tempDir)).toEqual([a, b]);
    });

    it('keeps only TypeScript sources among explicit files', async () => {
      const a = writeFile('src/a.ts');
      writeFile('src/types.d.ts');
      writeFile('src/notes.md');

      const files = await getFilesToAnalyze(['src/a.ts', 'src/types.d.ts', 'src/notes.md'], defaults(), tempDir);

      expect(files).toEqual([a]);
    });

    it('collects TypeScript files below a directory', async () => {
      const a = writeFile('lib/a.ts');
      const m = writeFile('lib/deep/m.mts');
      writeFile('lib/deep/decl.d.ts');
      writeFile('lib/deep/decl.d.mts');
      writeFile('lib/deep/decl.d.cts');
      writeFile('lib/readme.md');

      expect(await getFilesToAnalyze(['lib'], defaults(), tempDir)).toEqual([a, m]);
    });

    it('collects files below a directory whose name holds glob characters', async () => {
      const page = writeFile('app/(auth)/page.ts');
      const layout = writeFile('app/(auth)/[id]/layout.tsx');

      expect(await getFilesToAnalyze(['app/(auth)'], defaults(), tempDir)).toEqual([layout, page]);
    });

    it('skips node_modules below an explicit directory', async () => {
      const a = writeFile('pkg/a.ts');
      writeFile('pkg/node_modules/dep/index.ts');

      expect(await getFilesToAnalyze(['pkg'], defaults(), tempDir)).toEqual([a]);
    });

    it('fails for a path that does not exist', async () => {
      await expect(getFilesToAnalyze(['missing'], defaults(), tempDir)).rejects.toThrow();
    });
  });

  describe('checkCommand', () => {
    let originalExitCode: typeof process.exitCode;

    function environment(): CommandEnvironment {
      const logger = new Logger(false, true);
      return { config: defaults(), configPath: null, logger, cwd: tempDir, commandLogger: logger };
    }

    beforeEach(() => {
      originalExitCode = process.exitCode;
    });

    afterEach(() => {
      process.exitCode = originalExitCode;
    });

    it('prints findings as JSON and sets a failing exit code', async () => {
      const servicePath = writeFile('src/service.ts', SERVICE_SOURCE);
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      await checkCommand({ json: true, paths: ['src'] })(environment());

      expect(log).toHaveBeenCalledTimes(1);
      const output: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
      expect(output).toMatchObject({
        findings: [{ filePath: servicePath, line: 1, column: 27, parameterName: 'host', functionDisplayName: 'connect' }],
        summary: { total: 1, filesAnalyzed: 1, functionsAnalyzed: 1, filesWithFindings: 1 }
      });
      expect(process.exitCode).toBe(1);
    });

    it('honours custom assertion functions from the command line', async () => {
      writeFile('src/service.ts', SERVICE_SOURCE);
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      await checkCommand({ quiet: true, assert: 'check' })(environment());

      expect(log).toHaveBeenCalledWith('Findings: 0, Files: 1, Functions: 1');
      expect(process.exitCode).toBe(originalExitCode);
    });

    it('exits with the no-files code when nothing matches', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit');
      });

      await expect(checkCommand({ quiet: true })(environment())).rejects.toThrow('process.exit');
      expect(exit).toHaveBeenCalledWith(4);
    });
  });
});
