/**
 * Unit Tests: CLI
 * Exit codes, usage errors and full install/destroy runs against
 * in-process stand-ins.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { EXIT_FAILURE, EXIT_SUCCESS, normalizeArgv, run, type CliIO } from '../../../src/cli/cli';
import { loadKubeconfig } from '../../../src/infrastructure/kubernetes/client';
import {
  createFakeClusterAccess,
  createFakeFetch,
  createFakeRunner,
  createMockLogger,
  createTempDir,
  removeTempDir,
  writeKubeconfig,
  type CommandHandler,
  type RecordedCall,
} from '../../__support__/utilities/mock-infrastructure';

function createIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

const GCLOUD_CONFIG: Record<string, string> = {
  project: 'test-project',
  'compute/zone': 'us-central1-a',
  account: 'operator@example.com',
};

function createHandler(options: { validateFails?: boolean } = {}) {
  let cluster = false;
  return async (call: RecordedCall) => {
    if (call.command === 'gcloud' && call.args[0] === 'config') {
      return { stdout: GCLOUD_CONFIG[call.args[2] ?? ''] ?? '(unset)' };
    }
    if (call.command.endsWith('/kops')) {
      switch (call.args[0]) {
        case 'get':
          return cluster ? {} : { exitCode: 1, stderr: 'cluster not found' };
        case 'create':
          cluster = true;
          return {};
        case 'export':
          await writeKubeconfig(call.options.env?.KUBECONFIG ?? '', 'demo.k8s.local');
          return {};
        case 'validate':
          return options.validateFails ? { exitCode: 2, stderr: 'cluster not yet healthy' } : {};
        case 'delete':
          cluster = false;
          return {};
      }
    }
    return {};
  };
}

describe('CLI', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  function overrides(handler: CommandHandler = createHandler()) {
    const fake = createFakeRunner(handler);
    const clusterAccess = createFakeClusterAccess();
    return {
      calls: fake.calls,
      clusterAccess,
      value: {
        logger: createMockLogger(),
        runner: fake.runner,
        fetch: createFakeFetch().fetch,
        clusterAccess,
        env: {},
        osType: 'linux',
        homeDir: root,
      },
    };
  }

  describe('usage', () => {
    it('fails with exit code 2 when no command is supplied', async () => {
      const io = createIO();

      await expect(run([], io, overrides().value)).resolves.toBe(EXIT_FAILURE);

      expect(io.err).toEqual(['ERROR: command not supplied\n']);
      expect(io.out).toEqual([]);
    });

    it('reports an unknown command and prints usage', async () => {
      const io = createIO();
      const { calls, value } = overrides();

      await expect(run(['deploy'], io, value)).resolves.toBe(EXIT_FAILURE);

      expect(io.err[0]).toBe("ERROR: invalid command 'deploy'\n");
      expect(io.err[1]).toContain('Usage: kops-gce [options] [command]');
      expect(calls).toEqual([]);
    });

    it('prints help and exits 0', async () => {
      const io = createIO();

      await expect(run(['--help'], io, overrides().value)).resolves.toBe(EXIT_SUCCESS);

      expect(io.out.join('')).toContain('--cluster-name <name>');
    });

    it('prints the package version', async () => {
      const io = createIO();

      await expect(run(['--version'], io, overrides().value)).resolves.toBe(EXIT_SUCCESS);

      expect(io.out).toEqual(['0.1.0\n']);
    });

    it('rejects unknown options with exit code 2', async () => {
      const io = createIO();

      await expect(run(['install', '--bogus'], io, overrides().value)).resolves.toBe(EXIT_FAILURE);

      expect(io.err).toHaveLength(1);
      expect(io.err[0]).toMatch(/^ERROR: unknown option '--bogus'/);
    });
  });

  describe('normalizeArgv', () => {
    it('rewrites the two-letter skip flag to its long form', () => {
      expect(normalizeArgv(['install', '-sc', '-c', 'demo'])).toEqual([
        'install',
        '--skip-credentials',
        '-c',
        'demo',
      ]);
    });
  });

  describe('install', () => {
    it('installs with gcloud defaults and prints a completion line', async () => {
      const io = createIO();
      const { calls, clusterAccess, value } = overrides();

      const code = await run(['install', '-c', 'demo', '-sc'], io, value);

      expect(code).toBe(EXIT_SUCCESS);
      expect(io.out).toEqual(['install completed for demo.k8s.local\n']);
      expect(io.err).toEqual([]);
      expect(calls.slice(0, 2).map((call) => call.args.join(' '))).toEqual([
        'config get-value project',
        'config get-value compute/zone',
      ]);
      expect(calls.some((call) => call.args.includes('login'))).toBe(false);
      expect(clusterAccess.accounts).toEqual(['operator@example.com']);

      const kubeconfig = await loadKubeconfig(join(root, '.kops-gce', 'demo', 'kubeconfig'));
      expect(kubeconfig.getCurrentContext()).toBe('demo');
    });

    it('does not consult gcloud for values given on the command line', async () => {
      const io = createIO();
      const { calls, value } = overrides();

      const code = await run(
        ['install', '-c', 'demo', '-z', 'europe-west1-b', '-p', 'other-project', '-s', '-w', join(root, 'work')],
        io,
        value,
      );

      expect(code).toBe(EXIT_SUCCESS);
      expect(calls[0]?.args).toEqual(['mb', '-p', 'other-project', 'gs://other-project-demo-state']);
      const create = calls.find((call) => call.args[0] === 'create');
      expect(create?.args).toContain('europe-west1-b');
    });

    it('exits 2 with one error line naming the failed step', async () => {
      const io = createIO();
      const { value } = overrides(createHandler({ validateFails: true }));

      const code = await run(['install', '-c', 'demo', '-sc'], io, value);

      expect(code).toBe(EXIT_FAILURE);
      expect(io.out).toEqual([]);
      expect(io.err).toEqual([
        'ERROR: validate-cluster failed (kops validate cluster): cluster demo.k8s.local did not become ready: ' +
          'kops validate cluster --name demo.k8s.local --state gs://test-project-demo-state --wait 10m: cluster not yet healthy\n',
      ]);
    });

    it('names the failed step when a collaborator program cannot be started', async () => {
      const io = createIO();
      const { value } = overrides(async (call) => {
        if (call.command === 'gsutil') {
          throw new Error('spawn gsutil ENOENT');
        }
        return {};
      });

      const code = await run(['install', '-sc', '-p', 'p1', '-z', 'z1', '-w', join(root, 'work')], io, value);

      expect(code).toBe(EXIT_FAILURE);
      expect(io.err).toEqual([
        'ERROR: ensure-store failed (gsutil mb gs://p1-kops-state): gsutil mb -p p1 gs://p1-kops-state: spawn gsutil ENOENT\n',
      ]);
    });

    it('reports a missing project id as a configuration error', async () => {
      const io = createIO();
      const { value } = overrides(async () => ({ stdout: '(unset)' }));

      const code = await run(['install', '-sc'], io, value);

      expect(code).toBe(EXIT_FAILURE);
      expect(io.err).toEqual([
        'ERROR: load-configuration failed: Configuration validation failed: cluster.projectId: ' +
          'project id is required (pass --project-id or set a gcloud default project)\n',
      ]);
    });
  });

  describe('destroy', () => {
    it('tears down after an install and removes the work directory', async () => {
      const handler = createHandler();
      const workDir = join(root, 'work');

      expect(await run(['install', '-c', 'demo', '-sc', '-w', workDir], createIO(), overrides(handler).value)).toBe(
        EXIT_SUCCESS,
      );

      const io = createIO();
      const { calls, value } = overrides(handler);
      const code = await run(['destroy', '-c', 'demo', '-w', workDir], io, value);

      expect(code).toBe(EXIT_SUCCESS);
      expect(io.out).toEqual(['destroy completed for demo.k8s.local\n']);
      expect(calls.map((call) => call.args.slice(0, 2).join(' '))).toEqual([
        'config get-value',
        'delete cluster',
        '-m rm',
      ]);
      await expect(access(workDir)).rejects.toThrow();
    });
  });
});
