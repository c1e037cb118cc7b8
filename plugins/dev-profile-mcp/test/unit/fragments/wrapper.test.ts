import os from 'os';
import path from 'path';
import { FragmentScope } from '../../../src/fragments/scope.js';
import { registerWrapper, resolveCommand } from '../../../src/fragments/wrapper.js';
import type { WrapperSpec } from '../../../src/fragments/wrapper.js';
import type { Fragment } from '../../../src/fragments/types.js';
import type { ProfileContext } from '../../../src/tools/context.js';
import { DURATION_TIMEOUTS } from '../../../src/types/duration.js';
import { makeContext, testConfig } from '../fakes.js';

const containers: Fragment = {
  id: 'containers',
  description: 'container tools',
  prefix: 'ctr',
  requires: [],
  anyOf: ['docker', 'podman'],
  register: () => undefined,
};

function install(ctx: ProfileContext, spec: WrapperSpec): void {
  registerWrapper(ctx, new FragmentScope(ctx, containers, 'always'), spec);
}

async function call(ctx: ProfileContext, name: string, args: Record<string, unknown> = {}) {
  const tool = ctx.registry.get(name);
  if (!tool) throw new Error(`tool ${name} not registered`);
  return tool.execute(args);
}

describe('resolveCommand', () => {
  it('returns the first available candidate', () => {
    const { ctx } = makeContext({ installed: { docker: '/usr/bin/docker', podman: '/usr/bin/podman' } });
    expect(resolveCommand(ctx, ['podman', 'docker'])).toBe('podman');
    expect(resolveCommand(ctx, 'docker')).toBe('docker');
  });

  it('returns null when nothing is installed', () => {
    const { ctx } = makeContext();
    expect(resolveCommand(ctx, ['docker', 'podman'])).toBeNull();
  });
});

describe('registerWrapper', () => {
  const ps: WrapperSpec = {
    name: 'ctr_ps',
    description: 'List containers',
    command: ['docker', 'podman'],
    baseArgs: ['ps'],
    duration: 'quick',
    readOnly: true,
  };

  it('forwards base args then caller args and returns trimmed output', async () => {
    const { ctx, executor } = makeContext({ installed: { docker: '/usr/bin/docker' } });
    install(ctx, ps);
    executor.reply({ stdout: 'CONTAINER ID   IMAGE\n', durationMs: 12 });

    const cwd = os.tmpdir();
    const res = await call(ctx, 'ctr_ps', { args: ['--all'], cwd });

    expect(executor.commands).toEqual([{
      command: { argv: ['docker', 'ps', '--all'], cwd },
      timeoutMs: DURATION_TIMEOUTS.quick,
    }]);
    expect(res).toEqual({
      status: 'success',
      tool: 'ctr_ps',
      duration_ms: 12,
      command_executed: 'docker ps --all',
      data: { stdout: 'CONTAINER ID   IMAGE', exit_code: 0 },
    });
  });

  it('falls back to the next alternative', async () => {
    const { ctx, executor } = makeContext({ installed: { podman: '/usr/bin/podman' } });
    install(ctx, ps);
    await call(ctx, 'ctr_ps');
    expect(executor.commands[0].command.argv).toEqual(['podman', 'ps']);
  });

  it('reports an unavailable command with its install hint instead of running it', async () => {
    const { ctx, executor } = makeContext();
    install(ctx, ps);

    const res = await call(ctx, 'ctr_ps');

    expect(executor.commands).toEqual([]);
    expect(res).toEqual({
      status: 'error',
      tool: 'ctr_ps',
      duration_ms: 0,
      command_executed: null,
      error_code: 'COMMAND_UNAVAILABLE',
      error_category: 'unavailable',
      message: 'docker or podman is not installed or not on PATH',
      remediation: [
        'Install docker: sudo apt-get install docker.io',
        'After installing, run profile_cache_invalidate so the new command is detected',
      ],
    });
  });

  it('sees a command installed after invalidation', async () => {
    const { ctx, probe, executor } = makeContext();
    install(ctx, ps);
    expect((await call(ctx, 'ctr_ps')).status).toBe('error');

    probe.installed.set('docker', '/usr/local/bin/docker');
    ctx.availability.invalidate('docker');
    expect((await call(ctx, 'ctr_ps')).status).toBe('success');
    expect(executor.commands).toHaveLength(1);
  });

  it('returns COMMAND_FAILED with stderr and the exit code', async () => {
    const { ctx, executor } = makeContext({ installed: { docker: '/usr/bin/docker' } });
    install(ctx, ps);
    executor.reply({ exitCode: 1, stderr: 'Cannot connect to the Docker daemon\n' });

    const res = await call(ctx, 'ctr_ps');
    expect(res).toMatchObject({
      status: 'error',
      error_code: 'COMMAND_FAILED',
      error_category: 'state',
      message: 'Cannot connect to the Docker daemon',
      command_executed: 'docker ps',
      exit_code: 1,
    });
  });

  it('names the exit code when stderr is empty', async () => {
    const { ctx, executor } = makeContext({ installed: { docker: '/usr/bin/docker' } });
    install(ctx, ps);
    executor.reply({ exitCode: 2 });
    expect(await call(ctx, 'ctr_ps')).toMatchObject({ message: 'docker exited with code 2' });
  });

  it('reports a timeout', async () => {
    const { ctx, executor } = makeContext({ installed: { docker: '/usr/bin/docker' } });
    install(ctx, ps);
    executor.reply({ exitCode: 124, timedOut: true, durationMs: 15_000 });

    expect(await call(ctx, 'ctr_ps')).toMatchObject({
      error_code: 'COMMAND_TIMEOUT',
      error_category: 'timeout',
      duration_ms: 15_000,
    });
  });

  it('invalidates a cached command that can no longer be spawned', async () => {
    const { ctx, probe, executor } = makeContext({ installed: { docker: '/usr/bin/docker' } });
    install(ctx, ps);
    executor.reply({ exitCode: 127, stderr: 'spawn docker ENOENT', spawnError: 'ENOENT' });

    const res = await call(ctx, 'ctr_ps');
    probe.installed.delete('docker');

    expect(res).toMatchObject({
      error_code: 'COMMAND_SPAWN_FAILED',
      error_category: 'unavailable',
      message: 'docker could not be started (ENOENT)',
      exit_code: 127,
    });
    expect(ctx.availability.isAvailable('docker')).toBe(false);
    expect(probe.callsFor('docker')).toBe(2);
  });

  it('keeps the cache entry when the command itself exits 127', async () => {
    const { ctx, probe, executor } = makeContext({ installed: { docker: '/usr/bin/docker' } });
    install(ctx, ps);
    executor.reply({ exitCode: 127, stderr: 'plugin not found' });

    expect(await call(ctx, 'ctr_ps')).toMatchObject({ error_code: 'COMMAND_FAILED', exit_code: 127 });
    expect(ctx.availability.isAvailable('docker')).toBe(true);
    expect(probe.callsFor('docker')).toBe(1);
  });

  it('keeps an overridden command when it fails to spawn', async () => {
    const { ctx, executor } = makeContext();
    ctx.availability.setOverride('docker', true);
    install(ctx, ps);
    executor.reply({ exitCode: 127, spawnError: 'ENOENT' });

    await call(ctx, 'ctr_ps');
    expect(ctx.availability.hasOverride('docker')).toBe(true);
  });

  it('rejects a missing working directory without running or invalidating', async () => {
    const { ctx, probe, executor } = makeContext({ installed: { docker: '/usr/bin/docker' } });
    install(ctx, ps);

    const res = await call(ctx, 'ctr_ps', { cwd: path.join(os.tmpdir(), 'dev-profile-no-such-dir-xyz') });
    expect(res).toMatchObject({ status: 'error', error_code: 'CWD_NOT_FOUND', error_category: 'not_found' });
    expect(executor.commands).toEqual([]);
    expect(ctx.availability.isAvailable('docker')).toBe(true);
    expect(probe.callsFor('docker')).toBe(1);
  });

  it('reports a command killed by a signal without invalidating it', async () => {
    const { ctx, probe, executor } = makeContext({ installed: { docker: '/usr/bin/docker' } });
    install(ctx, ps);
    executor.reply({ exitCode: 137, signal: 'SIGKILL' });

    expect(await call(ctx, 'ctr_ps')).toMatchObject({
      error_code: 'COMMAND_FAILED',
      message: 'docker was killed by SIGKILL',
      exit_code: 137,
    });
    expect(ctx.availability.isAvailable('docker')).toBe(true);
    expect(probe.callsFor('docker')).toBe(1);
  });

  it('reports output over the buffer limit without invalidating', async () => {
    const { ctx, probe, executor } = makeContext({ installed: { docker: '/usr/bin/docker' } });
    install(ctx, ps);
    executor.reply({ exitCode: 1, stdout: 'x'.repeat(64), truncated: true });

    expect(await call(ctx, 'ctr_ps')).toMatchObject({
      error_code: 'OUTPUT_LIMIT_EXCEEDED',
      error_category: 'state',
      message: 'docker ps produced more output than execution.max_output_kb allows',
    });
    expect(ctx.availability.isAvailable('docker')).toBe(true);
    expect(probe.callsFor('docker')).toBe(1);
  });

  it('caps the timeout at the configured ceiling', async () => {
    const config = testConfig();
    config.execution.timeout_ceiling_seconds = 3;
    const { ctx, executor } = makeContext({ config, installed: { docker: '/usr/bin/docker' } });
    install(ctx, ps);

    await call(ctx, 'ctr_ps');
    expect(executor.commands[0].timeoutMs).toBe(3_000);
  });

  it('quotes arguments with spaces in command_executed', async () => {
    const { ctx } = makeContext({ installed: { docker: '/usr/bin/docker' } });
    install(ctx, { ...ps, name: 'ctr_logs', baseArgs: ['logs'] });
    const res = await call(ctx, 'ctr_logs', { args: ['--since', '10 min ago', 'web'] });
    expect(res).toMatchObject({ command_executed: 'docker logs --since "10 min ago" web' });
  });

  it('rejects arguments that are not strings', async () => {
    const { ctx, executor } = makeContext({ installed: { docker: '/usr/bin/docker' } });
    install(ctx, ps);
    const res = await call(ctx, 'ctr_ps', { args: [1] });
    expect(res).toMatchObject({ status: 'error', error_code: 'INVALID_ARGUMENTS', error_category: 'validation' });
    expect(executor.commands).toEqual([]);
  });
});
