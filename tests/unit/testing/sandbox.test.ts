/* eslint-disable @typescript-eslint/no-unsafe-member-access */
/* eslint-disable @typescript-eslint/no-unsafe-call */
import { SandboxManager } from '../../../src/testing/sandbox';
import { SandboxError } from '../../../src/testing/errors';
import { Sandbox } from '@e2b/code-interpreter';

jest.mock('@e2b/code-interpreter', () => ({
  Sandbox: {
    create: jest.fn(),
  },
}));

class CommandExitError extends Error {
  constructor(
    public exitCode: number,
    public stderr: string,
  ) {
    super(`exit status ${exitCode}`);
  }
}

describe('SandboxManager', () => {
  let manager: SandboxManager;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  let mockSandbox: any;

  beforeEach(() => {
    jest.clearAllMocks();

    mockSandbox = {
      files: {
        write: jest.fn().mockResolvedValue(undefined),
      },
      commands: {
        run: jest.fn().mockResolvedValue({
          stdout: 'output line 1\noutput line 2',
          stderr: '',
          exitCode: 0,
        }),
      },
      kill: jest.fn().mockResolvedValue(undefined),
    };

    (Sandbox.create as jest.Mock).mockResolvedValue(mockSandbox);
    manager = new SandboxManager('test-secret');
  });

  describe('initialization', () => {
    it('should initialize the sandbox with provided options', async () => {
      const spy = jest.spyOn(Sandbox, 'create');
      await manager.init({ timeoutMs: 1000, template: 'base' });

      expect(spy).toHaveBeenCalledWith('base', expect.objectContaining({ apiKey: 'test-secret', timeoutMs: 1000 }));
    });

    it('should require an API key', () => {
      const saved = process.env.E2B_API_KEY;
      delete process.env.E2B_API_KEY;
      try {
        expect(() => new SandboxManager()).toThrow(SandboxError);
      } finally {
        if (saved !== undefined) process.env.E2B_API_KEY = saved;
      }
    });

    it('should refuse to run commands before init', async () => {
      await expect(manager.executeCommand('ls')).rejects.toThrow('Sandbox not initialized');
    });
  });

  describe('file operations', () => {
    beforeEach(async () => {
      await manager.init();
    });

    it('should call files.write with correct arguments', async () => {
      await manager.uploadFile('/tmp/test.txt', 'hello world');
      expect(mockSandbox.files.write).toHaveBeenCalledWith('/tmp/test.txt', 'hello world');
    });
  });

  describe('command execution', () => {
    beforeEach(async () => {
      await manager.init();
    });

    it('should join the arguments and return the raw output', async () => {
      const result = await manager.executeCommand('ls', ['-la'], 5000);

      expect(mockSandbox.commands.run).toHaveBeenCalledWith('ls -la', { timeoutMs: 5000 });
      expect(result).toEqual({ stdout: 'output line 1\noutput line 2', stderr: '', exitCode: 0, timedOut: false });
    });

    it('should handle commands without arguments', async () => {
      await manager.executeCommand('whoami');
      expect(mockSandbox.commands.run).toHaveBeenCalledWith('whoami', { timeoutMs: undefined });
    });

    it('should turn a non-zero exit into a result', async () => {
      mockSandbox.commands.run.mockRejectedValueOnce(new CommandExitError(1, 'Traceback'));

      await expect(manager.executeCommand('python3', ['main.py'])).resolves.toEqual({ stdout: '', stderr: 'Traceback', exitCode: 1, timedOut: false });
    });

    it('should turn a deadline error into a timed out result', async () => {
      const timeout = new Error('command timed out');
      timeout.name = 'TimeoutError';
      mockSandbox.commands.run.mockRejectedValueOnce(timeout);

      await expect(manager.executeCommand('python3', ['main.py'])).resolves.toEqual({ stdout: '', stderr: '', exitCode: null, timedOut: true });
    });

    it('should rethrow other failures', async () => {
      mockSandbox.commands.run.mockRejectedValueOnce(new Error('connection reset'));
      await expect(manager.executeCommand('ls')).rejects.toThrow('connection reset');
    });
  });

  describe('cleanup', () => {
    it('should call kill on the sandbox and nullify the reference', async () => {
      await manager.init();
      await manager.cleanup();
      await manager.cleanup();
      expect(mockSandbox.kill).toHaveBeenCalledTimes(1);
    });
  });
});
