import { containCommand, runCommand, splitCommand, truncateOutput } from '../../../src/sandbox/commands';
import { BlockedCommandError, CommandNotAllowedError, CommandTimeoutError, PathContainmentError, SandboxPathNotFoundError } from '../../../src/sandbox/errors';
import { makeTempDir, NODE, NODE_NAME, removeDir } from '../../helpers/tmp';

describe('command containment', () => {
  describe('splitCommand', () => {
    it('honours quoting', () => {
      expect(splitCommand('pytest -q "tests/test a.py"')).toEqual(['pytest', '-q', 'tests/test a.py']);
    });

    it('keeps variables literally', () => {
      expect(splitCommand('git log $HOME')).toEqual(['git', 'log', '$HOME']);
    });

    it('passes globs through as arguments', () => {
      expect(splitCommand('ruff check *.py')).toEqual(['ruff', 'check', '*.py']);
    });

    it('rejects control operators', () => {
      expect(() => splitCommand('pytest && git push')).toThrow('Shell operator not allowed: &&');
    });

    it('rejects redirection', () => {
      expect(() => splitCommand('python app.py > out.txt')).toThrow(CommandNotAllowedError);
    });
  });

  describe('containCommand', () => {
    it('accepts an allow-listed executable', () => {
      expect(containCommand('pytest -q')).toEqual({ executable: 'pytest', name: 'pytest', args: ['-q'] });
    });

    it('matches the allow-list on the basename', () => {
      expect(containCommand('/usr/bin/git status').name).toBe('git');
    });

    it('rejects executables outside the allow-list', () => {
      expect(() => containCommand('ls -la')).toThrow('Command not allowed: ls');
    });

    it('rejects blocked substrings even when the executable is allowed', () => {
      expect(() => containCommand('rm -rf /', { allowedCommands: ['rm'] })).toThrow(BlockedCommandError);
    });

    it('matches blocked substrings case-insensitively', () => {
      expect(() => containCommand('python -c "import os" CURL', {})).toThrow('Command contains blocked token');
    });

    it('rejects blocked tokens inside arguments', () => {
      expect(() => containCommand('git clone https://x && sudo ls')).toThrow(BlockedCommandError);
    });

    it('rejects an empty command', () => {
      expect(() => containCommand('   ')).toThrow('Empty command');
    });
  });

  describe('truncateOutput', () => {
    it('appends the marker only when the limit is exceeded', () => {
      expect(truncateOutput('abcdef', 3)).toBe('abc\n...[truncated]');
      expect(truncateOutput('abc', 3)).toBe('abc');
    });
  });

  describe('runCommand', () => {
    let root: string;
    const options = { allowedCommands: [NODE_NAME] };

    beforeEach(() => {
      root = makeTempDir();
    });

    afterEach(() => {
      removeDir(root);
    });

    it('returns exit code and stdout', async () => {
      const result = await runCommand(`${NODE} -e "console.log('hi')"`, '.', root, options);
      expect(result).toEqual({ returncode: 0, output: 'hi\n' });
    });

    it('reports a nonzero exit code without throwing', async () => {
      const result = await runCommand(`${NODE} -e "process.exit(3)"`, '.', root, options);
      expect(result).toEqual({ returncode: 3, output: '' });
    });

    it('combines stdout and stderr', async () => {
      const result = await runCommand(`${NODE} -e "process.stdout.write('out;'); process.stderr.write('err')"`, '.', root, options);
      expect(result.output).toBe('out;err');
    });

    it('truncates long output', async () => {
      const result = await runCommand(`${NODE} -e "process.stdout.write('abcdefgh')"`, '.', root, { ...options, maxOutput: 5 });
      expect(result.output).toBe('abcde\n...[truncated]');
    });

    it('keeps multi-byte characters intact across output chunks', async () => {
      const result = await runCommand(`${NODE} -e "process.stdout.write('a'+'é'.repeat(200000))"`, '.', root, { ...options, maxOutput: 1_000_000 });
      expect(result.output).toBe('a' + 'é'.repeat(200000));
    });

    it('runs in the contained working directory', async () => {
      const result = await runCommand(`${NODE} -e "process.stdout.write(process.cwd())"`, '.', root, options);
      expect(result.output).toBe(root);
    });

    it('kills commands that exceed the timeout', async () => {
      await expect(runCommand(`${NODE} -e "setTimeout(() => {}, 10000)"`, '.', root, { ...options, timeoutMs: 200 })).rejects.toThrow(CommandTimeoutError);
    });

    it('rejects a working directory outside the root', async () => {
      await expect(runCommand(`${NODE} -e "1"`, '..', root, options)).rejects.toThrow(PathContainmentError);
    });

    it('rejects a missing working directory', async () => {
      await expect(runCommand(`${NODE} -e "1"`, 'nope', root, options)).rejects.toThrow(SandboxPathNotFoundError);
    });

    it('never spawns a disallowed executable', async () => {
      await expect(runCommand('pip install x', '.', root, options)).rejects.toThrow('Command not allowed: pip');
    });
  });
});
