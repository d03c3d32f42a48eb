/* eslint-disable @typescript-eslint/no-unsafe-member-access */
/* eslint-disable @typescript-eslint/no-unsafe-call */
import { E2BSandbox } from '../../../src/testing/executors/e2b-executor';
import { Sandbox } from '@e2b/code-interpreter';

jest.mock('@e2b/code-interpreter', () => ({
  Sandbox: {
    create: jest.fn(),
  },
}));

describe('E2BSandbox', () => {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  let mockSandbox: any;

  beforeEach(() => {
    jest.clearAllMocks();
    mockSandbox = {
      files: { write: jest.fn().mockResolvedValue(undefined) },
      commands: { run: jest.fn().mockResolvedValue({ stdout: 'ready', stderr: '', exitCode: 0 }) },
      kill: jest.fn().mockResolvedValue(undefined),
    };
    (Sandbox.create as jest.Mock).mockResolvedValue(mockSandbox);
  });

  it('should upload the program, run it and kill the sandbox', async () => {
    const sandbox = new E2BSandbox({ apiKey: 'test-secret', interpreter: 'python3' });

    const result = await sandbox.run({ source: 'print("ready")', timeoutSeconds: 2, fileExtension: '.py' });

    expect(Sandbox.create).toHaveBeenCalledWith('base', expect.objectContaining({ apiKey: 'test-secret', timeoutMs: 62_000 }));
    expect(mockSandbox.files.write).toHaveBeenCalledWith('/home/user/main.py', 'print("ready")');
    expect(mockSandbox.commands.run).toHaveBeenCalledWith('python3 /home/user/main.py', { timeoutMs: 2000 });
    expect(result).toMatchObject({ stdout: 'ready', exitCode: 0, timedOut: false });
    expect(mockSandbox.kill).toHaveBeenCalledTimes(1);
  });

  it('should kill the sandbox when the upload fails', async () => {
    mockSandbox.files.write.mockRejectedValueOnce(new Error('disk full'));
    const sandbox = new E2BSandbox({ apiKey: 'test-secret', interpreter: 'python3', template: 'game-runner' });

    await expect(sandbox.run({ source: 'x', timeoutSeconds: 1 })).rejects.toThrow('disk full');
    expect(Sandbox.create).toHaveBeenCalledWith('game-runner', expect.anything());
    expect(mockSandbox.kill).toHaveBeenCalledTimes(1);
  });
});
