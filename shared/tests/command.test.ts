/**
 * Tests for readFromCommand.
 * Uses a fake executor for error formatting and the real execFile executor
 * for a few POSIX tools.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { execFileExecutor, readFromCommand, type CommandExecutor } from '../src/utils/command.js';
import { CommandError } from '../src/utils/errorTypes.js';

describe('readFromCommand', () => {
  describe('with a fake executor', () => {
    it('should return stdout on success', async () => {
      const calls: Array<{ command: string; args: readonly string[] }> = [];
      const executor: CommandExecutor = async (command, args) => {
        calls.push({ command, args });
        return { stdout: Buffer.from('{"devices":[]}'), stderr: '' };
      };

      const output = await readFromCommand(executor, 'lsblk', '--json', '--bytes');

      assert.strictEqual(output.toString('utf8'), '{"devices":[]}');
      assert.deepStrictEqual(calls, [{ command: 'lsblk', args: ['--json', '--bytes'] }]);
    });

    it('should combine stderr with the underlying error', async () => {
      const cause = new Error('exit status 1');
      const executor: CommandExecutor = async () => ({
        stdout: Buffer.alloc(0),
        stderr: 'device not found',
        error: cause,
      });

      await assert.rejects(readFromCommand(executor, 'lsblk', '/dev/missing'), (error: unknown) => {
        assert.ok(error instanceof CommandError);
        assert.strictEqual(error.message, 'device not found: exit status 1');
        assert.strictEqual(error.command, 'lsblk');
        assert.deepStrictEqual(error.args, ['/dev/missing']);
        assert.strictEqual(error.stderr, 'device not found');
        assert.strictEqual(error.cause, cause);
        return true;
      });
    });

    it('should fail even when stdout was produced', async () => {
      const executor: CommandExecutor = async () => ({
        stdout: Buffer.from('partial'),
        stderr: '',
        error: new Error('killed'),
      });

      await assert.rejects(readFromCommand(executor, 'tool'), { message: ': killed' });
    });
  });

  describe('with execFileExecutor', () => {
    it('should capture stdout bytes', async () => {
      const output = await readFromCommand(execFileExecutor, 'echo', 'hello');

      assert.strictEqual(output.toString('utf8'), 'hello\n');
    });

    it('should return an empty buffer for a silent command', async () => {
      const output = await readFromCommand(execFileExecutor, 'true');

      assert.strictEqual(output.length, 0);
    });

    it('should report stderr and the exit code of a failing command', async () => {
      await assert.rejects(
        readFromCommand(execFileExecutor, 'sh', '-c', 'echo broken pipe >&2; exit 3'),
        (error: unknown) => {
          assert.ok(error instanceof CommandError);
          assert.strictEqual(error.stderr, 'broken pipe\n');
          assert.ok(error.message.startsWith('broken pipe\n: '));
          assert.strictEqual(error.context?.exitCode, '3');
          return true;
        }
      );
    });

    it('should fail for a command that does not exist', async () => {
      await assert.rejects(readFromCommand(execFileExecutor, 'definitely-not-a-command-xyz'), (error: unknown) => {
        assert.ok(error instanceof CommandError);
        assert.strictEqual(error.context?.exitCode, 'ENOENT');
        return true;
      });
    });
  });
});
