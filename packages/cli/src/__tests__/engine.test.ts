import { describe, it, expect } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { ComposeFailure } from '../errors';
import type { CommandRunner, ProcessSpawner, RunOptions, SpawnedProcess } from '../services/command-runner';
import {
  DockerComposeEngine,
  buildComposeArgs,
  parseByteSize,
  parseInspectOutput,
  parseNamedOutput,
  parsePercent,
  parseStatsOutput,
  type ComposeTarget,
} from '../services/engine.service';

class FakeProcess extends EventEmitter implements SpawnedProcess {
  stdout = new PassThrough();
  stderr = new PassThrough();
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  killedWith: NodeJS.Signals | null = null;

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.killedWith = signal;
    this.signalCode = signal;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', null));
    return true;
  }

  finish(code: number): void {
    this.exitCode = code;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code));
  }
}

interface RecordedCall {
  file: string;
  args: string[];
  options?: RunOptions;
}

function recordingRunner(respond: (args: string[]) => string = () => ''): { run: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const run: CommandRunner = async (file, args, options) => {
    calls.push({ file, args, options });
    return { stdout: respond(args), stderr: '' };
  };
  return { run, calls };
}

function failingRunner(stderr: string): CommandRunner {
  return async () => {
    throw Object.assign(new Error('Command failed'), { stderr });
  };
}

function spawnerFor(proc: FakeProcess): { spawn: ProcessSpawner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const spawn: ProcessSpawner = (file, args, options) => {
    calls.push({ file, args, options });
    return proc;
  };
  return { spawn, calls };
}

const target: ComposeTarget = {
  project: 'shop-local',
  files: ['docker/docker-compose.local.yml'],
  cwd: '/work/shop',
};

describe('output parsing', () => {
  it('should parse percentages', () => {
    expect(parsePercent('12.5%')).toBe(12.5);
    expect(parsePercent('0.00%')).toBe(0);
    expect(parsePercent('--')).toBe(0);
  });

  it('should parse docker byte sizes', () => {
    expect(parseByteSize('0B')).toBe(0);
    expect(parseByteSize('512kB')).toBe(512000);
    expect(parseByteSize('24.5MiB')).toBe(25690112);
    expect(parseByteSize('1.5GiB')).toBe(1610612736);
    expect(parseByteSize('garbage')).toBe(0);
  });

  it('should keep only compose-managed containers from inspect output', () => {
    const output = JSON.stringify([
      {
        Id: 'abc123',
        Name: '/shop-local-backend-1',
        State: { Status: 'running', Pid: 42 },
        Config: {
          Labels: {
            'com.docker.compose.project': 'shop-local',
            'com.docker.compose.service': 'backend',
            'com.docker.compose.project.config_files':
              '/work/shop/docker/docker-compose.local.yml,/work/shop/docker/docker-compose.local-debug.yml',
          },
        },
      },
      {
        Id: 'def456',
        Name: '/buildkit',
        State: { Status: 'running' },
        Config: { Labels: null },
      },
    ]);

    expect(parseInspectOutput(output)).toEqual([
      {
        id: 'abc123',
        name: 'shop-local-backend-1',
        project: 'shop-local',
        service: 'backend',
        state: 'running',
        configFiles: [
          '/work/shop/docker/docker-compose.local.yml',
          '/work/shop/docker/docker-compose.local-debug.yml',
        ],
      },
    ]);
  });

  it('should pair ids with names from ps output', () => {
    expect(parseNamedOutput('abc123\tshop_prod_frontend\n\ndef456\tshop-local-redis-1\n')).toEqual([
      { id: 'abc123', name: 'shop_prod_frontend' },
      { id: 'def456', name: 'shop-local-redis-1' },
    ]);
  });

  it('should parse one stats record per line', () => {
    const output = [
      '{"ID":"abc123","Name":"shop-local-backend-1","CPUPerc":"1.25%","MemUsage":"24.5MiB / 1.944GiB","MemPerc":"1.23%","NetIO":"1kB / 2kB"}',
      '',
    ].join('\n');

    expect(parseStatsOutput(output)).toEqual([
      {
        id: 'abc123',
        name: 'shop-local-backend-1',
        cpuPercent: 1.25,
        memoryUsage: '24.5MiB / 1.944GiB',
        memoryBytes: 25690112,
        memoryPercent: 1.23,
      },
    ]);
  });

  it('should pass the project name and every compose file', () => {
    expect(
      buildComposeArgs({
        project: 'shop-prod',
        files: ['docker/docker-compose.prod.yml', 'docker/docker-compose.prod-debug.yml'],
      })
    ).toEqual([
      'compose',
      '-p',
      'shop-prod',
      '-f',
      'docker/docker-compose.prod.yml',
      '-f',
      'docker/docker-compose.prod-debug.yml',
    ]);
  });
});

describe('DockerComposeEngine', () => {
  it('should run compose up detached with a rebuild', async () => {
    const { run, calls } = recordingRunner();
    const engine = new DockerComposeEngine({ run });

    await engine.up({ ...target, env: { ENVIRONMENT: 'local' } });

    expect(calls).toEqual([
      {
        file: 'docker',
        args: [
          'compose',
          '-p',
          'shop-local',
          '-f',
          'docker/docker-compose.local.yml',
          'up',
          '-d',
          '--build',
          '--remove-orphans',
        ],
        options: { cwd: '/work/shop', env: { ENVIRONMENT: 'local' } },
      },
    ]);
  });

  it('should surface the engine diagnostic as ComposeFailure', async () => {
    const engine = new DockerComposeEngine({ run: failingRunner('port is already allocated\n') });

    await expect(engine.up(target)).rejects.toThrow(new ComposeFailure('port is already allocated'));
  });

  it('should explain a missing compose plugin', async () => {
    const engine = new DockerComposeEngine({ run: failingRunner("docker: 'compose' is not a docker command.") });

    await expect(engine.checkAvailable()).rejects.toThrow(/^Docker Compose is not available/);
  });

  it('should inspect containers listed by ps', async () => {
    const { run, calls } = recordingRunner((args) =>
      args[0] === 'ps'
        ? 'abc123\n'
        : JSON.stringify([
            {
              Id: 'abc123',
              Name: '/shop-prod-frontend-1',
              State: { Status: 'running' },
              Config: {
                Labels: {
                  'com.docker.compose.project': 'shop-prod',
                  'com.docker.compose.service': 'frontend',
                },
              },
            },
          ])
    );
    const engine = new DockerComposeEngine({ run });

    const containers = await engine.listContainers();

    expect(calls.map((c) => c.args)).toEqual([
      ['ps', '-q', '--filter', 'label=com.docker.compose.project'],
      ['inspect', 'abc123'],
    ]);
    expect(containers).toEqual([
      {
        id: 'abc123',
        name: 'shop-prod-frontend-1',
        project: 'shop-prod',
        service: 'frontend',
        state: 'running',
        configFiles: [],
      },
    ]);
  });

  it('should drop containers removed between ps and inspect', async () => {
    const found = {
      Id: 'abc123',
      Name: '/shop-prod-frontend-1',
      State: { Status: 'running' },
      Config: { Labels: { 'com.docker.compose.project': 'shop-prod', 'com.docker.compose.service': 'frontend' } },
    };
    const run: CommandRunner = async (_file, args) => {
      if (args[0] === 'ps') {
        return { stdout: 'abc123\ngone\n', stderr: '' };
      }
      throw Object.assign(new Error('Command failed'), {
        stdout: JSON.stringify([found]),
        stderr: 'Error: No such object: gone\n',
      });
    };
    const engine = new DockerComposeEngine({ run });

    const containers = await engine.listContainers();

    expect(containers.map((c) => c.id)).toEqual(['abc123']);
  });

  it('should return nothing when every listed container is gone', async () => {
    const run: CommandRunner = async (_file, args) => {
      if (args[0] === 'ps') {
        return { stdout: 'gone\n', stderr: '' };
      }
      throw Object.assign(new Error('Command failed'), { stdout: '', stderr: 'Error: No such container: gone' });
    };

    expect(await new DockerComposeEngine({ run }).listContainers()).toEqual([]);
  });

  it('should still fail on any other inspect error', async () => {
    const run: CommandRunner = async (_file, args) => {
      if (args[0] === 'ps') {
        return { stdout: 'abc123\n', stderr: '' };
      }
      throw Object.assign(new Error('Command failed'), { stderr: 'Cannot connect to the Docker daemon' });
    };

    await expect(new DockerComposeEngine({ run }).listContainers()).rejects.toThrow(
      new ComposeFailure('Cannot connect to the Docker daemon')
    );
  });

  it('should list every container by name and force-remove by id', async () => {
    const { run, calls } = recordingRunner((args) => (args[0] === 'ps' ? 'a1\tshop_prod_frontend\n' : ''));
    const engine = new DockerComposeEngine({ run });

    expect(await engine.listNamed()).toEqual([{ id: 'a1', name: 'shop_prod_frontend' }]);
    await engine.remove(['a1']);
    await engine.remove([]);

    expect(calls.map((c) => c.args)).toEqual([
      ['ps', '-a', '--format', '{{.ID}}\t{{.Names}}'],
      ['rm', '-f', 'a1'],
    ]);
  });

  it('should skip inspect when nothing is running', async () => {
    const { run, calls } = recordingRunner();
    const engine = new DockerComposeEngine({ run });

    expect(await engine.listContainers()).toEqual([]);
    expect(calls).toHaveLength(1);
  });

  it('should map exec exit status to a boolean', async () => {
    expect(await new DockerComposeEngine({ run: recordingRunner().run }).exec('abc', ['redis-cli', 'ping'])).toBe(
      true
    );
    expect(await new DockerComposeEngine({ run: failingRunner('Could not connect') }).exec('abc', ['redis-cli', 'ping'])).toBe(
      false
    );
  });

  describe('logs', () => {
    it('should yield lines until the process exits', async () => {
      const proc = new FakeProcess();
      const { spawn, calls } = spawnerFor(proc);
      const engine = new DockerComposeEngine({ spawn });
      proc.stdout.write('backend-1  | started\nbackend-1  | listening\n');

      const lines: string[] = [];
      const reading = (async () => {
        for await (const line of engine.logs(target, { follow: false, tail: 5, service: 'backend' })) {
          lines.push(line);
        }
      })();
      proc.finish(0);
      await reading;

      expect(lines).toEqual(['backend-1  | started', 'backend-1  | listening']);
      expect(calls[0].args).toEqual([
        'compose',
        '-p',
        'shop-local',
        '-f',
        'docker/docker-compose.local.yml',
        'logs',
        '--no-color',
        '--tail',
        '5',
        'backend',
      ]);
      expect(proc.killedWith).toBeNull();
    });

    it('should kill the process when the consumer stops early', async () => {
      const proc = new FakeProcess();
      const engine = new DockerComposeEngine({ spawn: spawnerFor(proc).spawn });
      proc.stdout.write('first\nsecond\n');

      const seen: string[] = [];
      for await (const line of engine.logs(target, { follow: true })) {
        seen.push(line);
        break;
      }

      expect(seen).toEqual(['first']);
      expect(proc.killedWith).toBe('SIGTERM');
    });

    it('should stop following when aborted', async () => {
      const proc = new FakeProcess();
      const { spawn, calls } = spawnerFor(proc);
      const engine = new DockerComposeEngine({ spawn });
      const controller = new AbortController();
      proc.stdout.write('one\n');

      const lines: string[] = [];
      const reading = (async () => {
        for await (const line of engine.logs(target, { follow: true, signal: controller.signal })) {
          lines.push(line);
        }
      })();
      controller.abort();
      await reading;

      expect(calls[0].args).toContain('--follow');
      expect(lines).toEqual(['one']);
      expect(proc.killedWith).toBe('SIGTERM');
    });

    it('should fail with the stderr of a failed process', async () => {
      const proc = new FakeProcess();
      const engine = new DockerComposeEngine({ spawn: spawnerFor(proc).spawn });
      proc.stderr.write('no such service: api\n');

      const reading = (async () => {
        for await (const line of engine.logs(target, { follow: false, service: 'api' })) {
          expect(line).toBe('unexpected');
        }
      })();
      proc.finish(1);

      await expect(reading).rejects.toThrow(new ComposeFailure('no such service: api'));
    });
  });
});
