import { initializeProfile } from '../../../src/bootstrap.js';
import type { Fragment } from '../../../src/fragments/types.js';
import { registerWrappers } from '../../../src/fragments/wrapper.js';
import type { ProfileContext } from '../../../src/tools/context.js';
import type { SuccessResponse, ToolResponse } from '../../../src/types/response.js';
import { makeContext, testConfig } from '../fakes.js';

const npmFragment: Fragment = {
  id: 'node',
  description: 'npm tools',
  prefix: 'npm',
  requires: ['npm'],
  register(ctx, scope) {
    registerWrappers(ctx, scope, 'npm', [{ name: 'npm_ci', description: 'Clean install', baseArgs: ['ci'] }]);
  },
};

const kubeFragment: Fragment = {
  id: 'kubernetes',
  description: 'kubectl tools',
  prefix: 'k8s',
  requires: ['kubectl'],
  register(ctx, scope) {
    registerWrappers(ctx, scope, 'kubectl', [{ name: 'k8s_get', description: 'Get resources', baseArgs: ['get'] }]);
  },
};

async function call(ctx: ProfileContext, name: string, args: Record<string, unknown> = {}): Promise<ToolResponse> {
  const tool = ctx.registry.get(name);
  if (!tool) throw new Error(`tool ${name} not registered`);
  return tool.execute(args);
}

async function data(ctx: ProfileContext, name: string, args: Record<string, unknown> = {}): Promise<SuccessResponse> {
  const res = await call(ctx, name, args);
  if (res.status !== 'success') throw new Error(`${name} failed: ${res.message}`);
  return res;
}

describe('profile tools', () => {
  describe('profile_command_check', () => {
    it('reports each name with path or install hint', async () => {
      const { ctx } = makeContext({ installed: { git: '/usr/bin/git' } });
      initializeProfile(ctx, []);

      const res = await data(ctx, 'profile_command_check', { names: ['git', 'docker'] });
      expect(res.summary).toBe('1 of 2 available');
      expect(res.total).toBe(2);
      expect(res.data.commands).toEqual([
        expect.objectContaining({ name: 'git', available: true, source: 'probe', path: '/usr/bin/git' }),
        expect.objectContaining({ name: 'docker', available: false, path: null, install_hint: 'sudo apt-get install docker.io' }),
      ]);
    });

    it('rejects an empty list', async () => {
      const { ctx } = makeContext();
      initializeProfile(ctx, []);
      expect(await call(ctx, 'profile_command_check', { names: [] })).toMatchObject({
        status: 'error',
        error_code: 'INVALID_ARGUMENTS',
        error_category: 'validation',
      });
    });
  });

  describe('profile_cache_invalidate', () => {
    it('re-probes a single command', async () => {
      const { ctx, probe } = makeContext();
      initializeProfile(ctx, []);
      await data(ctx, 'profile_command_check', { names: ['docker'] });

      probe.installed.set('docker', '/usr/bin/docker');
      const res = await data(ctx, 'profile_cache_invalidate', { name: 'docker' });
      expect(res.data).toEqual({ invalidated: 'docker', cached_entries: 0 });
      expect(ctx.availability.isAvailable('docker')).toBe(true);
    });

    it('clears everything when no name is given', async () => {
      const { ctx } = makeContext();
      initializeProfile(ctx, []);
      ctx.availability.isAvailable('git');
      ctx.availability.isAvailable('npm');

      const res = await data(ctx, 'profile_cache_invalidate');
      expect(res.data).toEqual({ invalidated: 'all', cached_entries: 0 });
    });

    it('re-applies overrides pinned in config', async () => {
      const config = testConfig();
      config.availability.overrides = { docker: false };
      const { ctx, probe } = makeContext({ config, installed: { docker: '/usr/bin/docker' } });
      initializeProfile(ctx, []);
      expect(ctx.availability.isAvailable('docker')).toBe(false);

      await data(ctx, 'profile_cache_invalidate', { name: 'docker' });
      expect(ctx.availability.isAvailable('docker')).toBe(false);
      await data(ctx, 'profile_cache_invalidate');
      expect(ctx.availability.isAvailable('docker')).toBe(false);
      expect(probe.calls).toEqual([]);
    });

    it('re-applies a pinned override when the name is padded', async () => {
      const config = testConfig();
      config.availability.overrides = { docker: false };
      const { ctx } = makeContext({ config, installed: { docker: '/usr/bin/docker' } });
      initializeProfile(ctx, []);

      await data(ctx, 'profile_cache_invalidate', { name: ' docker' });
      expect(ctx.availability.hasOverride('docker')).toBe(true);
      expect(ctx.availability.isAvailable('docker')).toBe(false);
    });

    it('re-applies a pinned override for a differently cased name on Windows', async () => {
      const config = testConfig();
      config.availability.overrides = { docker: false };
      const { ctx, probe } = makeContext({ config, platform: 'win32', installed: { docker: 'C:\\Tools\\docker.exe' } });
      initializeProfile(ctx, []);

      await data(ctx, 'profile_cache_invalidate', { name: 'Docker' });
      expect(ctx.availability.hasOverride('DOCKER')).toBe(true);
      expect(ctx.availability.isAvailable('docker')).toBe(false);
      expect(probe.calls).toEqual([]);
    });

    it('drops a session override', async () => {
      const { ctx } = makeContext({ installed: { docker: '/usr/bin/docker' } });
      initializeProfile(ctx, []);
      await data(ctx, 'profile_cache_override', { name: 'docker', available: false });
      expect(ctx.availability.isAvailable('docker')).toBe(false);

      await data(ctx, 'profile_cache_invalidate', { name: 'docker' });
      expect(ctx.availability.isAvailable('docker')).toBe(true);
    });
  });

  describe('profile_cache_override', () => {
    it('returns the forced record', async () => {
      const { ctx, probe } = makeContext();
      initializeProfile(ctx, []);
      const res = await data(ctx, 'profile_cache_override', { name: 'kubectl', available: true });
      expect(res.data).toMatchObject({ name: 'kubectl', available: true, source: 'override', path: null });
      expect(probe.calls).toEqual([]);
    });

    it('requires the available flag', async () => {
      const { ctx } = makeContext();
      initializeProfile(ctx, []);
      const res = await call(ctx, 'profile_cache_override', { name: 'kubectl' });
      expect(res).toMatchObject({ status: 'error', error_code: 'INVALID_ARGUMENTS' });
      if (res.status === 'error') expect(res.message).toMatch(/^available: /);
    });
  });

  describe('profile_cache_snapshot', () => {
    it('lists cached records sorted by name', async () => {
      const { ctx } = makeContext({ installed: { npm: '/usr/bin/npm' } });
      initializeProfile(ctx, []);
      ctx.availability.isAvailable('npm');
      ctx.availability.isAvailable('git');

      const res = await data(ctx, 'profile_cache_snapshot');
      expect(res.total).toBe(2);
      expect(res.data.commands).toEqual([
        expect.objectContaining({ name: 'git', available: false }),
        expect.objectContaining({ name: 'npm', available: true }),
      ]);
    });
  });

  describe('profile_fragments', () => {
    it('summarises every fragment report', async () => {
      const { ctx } = makeContext({ installed: { npm: '/usr/bin/npm' } });
      initializeProfile(ctx, [npmFragment, kubeFragment]);

      const res = await data(ctx, 'profile_fragments');
      expect(res.data).toEqual({
        registration_mode: 'conditional',
        fragments: [
          { id: 'node', status: 'loaded', tools: 1 },
          { id: 'kubernetes', status: 'skipped', tools: 0, missing: ['kubectl'], install_hints: { kubectl: 'see kubernetes.io' } },
        ],
        tools_registered: 7,
      });
    });
  });

  describe('profile_doctor', () => {
    it('reports every command fragments use', async () => {
      const { ctx } = makeContext({ installed: { npm: '/usr/bin/npm' } });
      initializeProfile(ctx, [npmFragment, kubeFragment]);

      const res = await data(ctx, 'profile_doctor');
      expect(res.summary).toBe('1 of 2 commands available');
      expect(res.data).toMatchObject({
        config_path: '/tmp/dev-profile-test/config.yaml',
        registration_mode: 'conditional',
        available: ['npm'],
        tools_registered: 7,
      });
      expect(res.data.missing).toEqual([expect.objectContaining({ name: 'kubectl', install_hint: 'see kubernetes.io' })]);
      expect(res.data).not.toHaveProperty('load_errors');
      expect(res.data).not.toHaveProperty('setup');
    });

    it('surfaces load errors', async () => {
      const { ctx } = makeContext();
      ctx.loadErrors.push('extra.yaml: file not found');
      initializeProfile(ctx, []);

      const res = await data(ctx, 'profile_doctor');
      expect(res.data.load_errors).toEqual(['extra.yaml: file not found']);
    });
  });

  it('registers degraded fragments in always mode so their tools explain what is missing', async () => {
    const config = testConfig();
    config.registration.mode = 'always';
    const { ctx } = makeContext({ config });
    initializeProfile(ctx, [kubeFragment]);

    expect(ctx.fragmentReports[0].status).toBe('degraded');
    expect(await call(ctx, 'k8s_get')).toMatchObject({
      status: 'error',
      error_code: 'COMMAND_UNAVAILABLE',
      remediation: [
        'Install kubectl: see kubernetes.io',
        'After installing, run profile_cache_invalidate so the new command is detected',
      ],
    });
  });
});
