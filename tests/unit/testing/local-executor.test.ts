import { LocalProcessSandbox } from '../../../src/testing/executors/local-executor';
import { SandboxError } from '../../../src/testing/errors';

describe('LocalProcessSandbox', () => {
  const sandbox = new LocalProcessSandbox({ interpreter: process.execPath, env: { CODESMITH_GREETING: 'hi' } });

  it('should capture the output of a clean exit', async () => {
    const result = await sandbox.run({ source: 'console.log(process.env.CODESMITH_GREETING);', timeoutSeconds: 10, fileExtension: '.js' });

    expect(result).toMatchObject({ exitCode: 0, stdout: 'hi\n', stderr: '', timedOut: false });
  });

  it('should report a non-zero exit code with stderr', async () => {
    const result = await sandbox.run({ source: 'console.error("bad"); process.exit(3);', timeoutSeconds: 10, fileExtension: '.js' });

    expect(result).toMatchObject({ exitCode: 3, stderr: 'bad\n', timedOut: false });
  });

  it('should kill a program that outlives its deadline', async () => {
    const result = await sandbox.run({ source: 'setInterval(() => undefined, 1000);', timeoutSeconds: 0.5, fileExtension: '.js' });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
  });

  it('should reject when the interpreter cannot be started', async () => {
    const missing = new LocalProcessSandbox({ interpreter: '/nonexistent/codesmith-interpreter' });

    await expect(missing.run({ source: 'x', timeoutSeconds: 1 })).rejects.toThrow(SandboxError);
  });
});
