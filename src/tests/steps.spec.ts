import { describe, it, expect } from 'vitest';
import { runStep } from '../steps/registry.js';
import { splitCommand } from '../steps/command.js';
import { spawnRunner } from '../tools/cli/exec.js';
import { read } from '../blackboard/index.js';
import { FakeCommands, ScriptedTerminal, planOf, stepContext, stepOf } from './helpers.js';

describe('confirmation steps', () => {
  it('shows expanded text and completes on yes', async () => {
    const plan = planOf([{ name: 'check', text: 'Log in to ${host}', prompt: 'Logged in?' }], [{ name: 'host', value: 'db1' }]);
    const terminal = new ScriptedTerminal(['yes']);
    await runStep(stepOf(plan, 'check'), stepContext(plan, { terminal }));
    expect(terminal.printed).toEqual(['---[ check ] ---------------------', '\tLog in to db1']);
    expect(terminal.asked).toEqual(['Logged in? ']);
    expect(stepOf(plan, 'check').state).toBe('DONE');
  });

  it('fails on anything but yes', async () => {
    const plan = planOf([{ name: 'check', text: 'Is the light green?' }]);
    const terminal = new ScriptedTerminal(['no']);
    await runStep(stepOf(plan, 'check'), stepContext(plan, { terminal }));
    expect(terminal.asked).toEqual(['Done? ']);
    expect(stepOf(plan, 'check').state).toBe('FAILED');
  });
});

describe('assignment steps', () => {
  it('offers the expanded default', async () => {
    const plan = planOf(
      [{ name: 'set', variable: 'dir', default: '/srv/${app}' }],
      [{ name: 'dir' }, { name: 'app', value: 'shop' }]
    );
    const terminal = new ScriptedTerminal(['']);
    await runStep(stepOf(plan, 'set'), stepContext(plan, { terminal }));
    expect(terminal.printed).toEqual(['---[ set ] ---------------------', '\tSetting the value of variable dir']);
    expect(terminal.asked).toEqual(['Provide a value for dir\n (just pressing enter defaults it to /srv/shop) ']);
    expect(read(plan.variables, 'dir')).toBe('/srv/shop');
    expect(stepOf(plan, 'set').state).toBe('DONE');
  });

  it('takes an explicit answer over the default', async () => {
    const plan = planOf([{ name: 'set', variable: 'dir', default: 'x' }], [{ name: 'dir' }]);
    await runStep(stepOf(plan, 'set'), stepContext(plan, { terminal: new ScriptedTerminal(['/opt']) }));
    expect(read(plan.variables, 'dir')).toBe('/opt');
  });
});

describe('command steps', () => {
  it('splits the expanded command into argv', async () => {
    const plan = planOf([{ name: 'ls', command: 'ls  -l\t${dir}' }], [{ name: 'dir', value: '/tmp' }]);
    const commands = new FakeCommands({ ls: 0 });
    const terminal = new ScriptedTerminal();
    await runStep(stepOf(plan, 'ls'), stepContext(plan, { commands, terminal }));
    expect(commands.calls).toEqual([['ls', '-l', '/tmp']]);
    expect(terminal.printed[1]).toBe('\tRunning the following command:\n\t\tls  -l\t/tmp');
    expect(stepOf(plan, 'ls').state).toBe('DONE');
  });

  it('fails on a nonzero exit', async () => {
    const plan = planOf([{ name: 'grep', command: 'grep needle' }]);
    await runStep(stepOf(plan, 'grep'), stepContext(plan, { commands: new FakeCommands({ grep: 1 }) }));
    expect(stepOf(plan, 'grep').state).toBe('FAILED');
  });

  it('fails when the command expands to nothing', async () => {
    const plan = planOf([{ name: 'empty', command: '${unset}' }]);
    const commands = new FakeCommands();
    await runStep(stepOf(plan, 'empty'), stepContext(plan, { commands }));
    expect(commands.calls).toEqual([]);
    expect(stepOf(plan, 'empty').state).toBe('FAILED');
  });

  it('only reports in dry-run mode', async () => {
    const plan = planOf([{ name: 'rm', command: 'rm -rf /srv/old' }]);
    const terminal = new ScriptedTerminal();
    await runStep(stepOf(plan, 'rm'), stepContext(plan, { terminal, dryRun: true }));
    expect(terminal.printed.at(-1)).toBe('\t\tAction not done, because this is a dry-run');
    expect(stepOf(plan, 'rm').state).toBe('DONE');
  });

  it('splitCommand drops empty fields', () => {
    expect(splitCommand('  a  b\n c ')).toEqual(['a', 'b', 'c']);
    expect(splitCommand('   ')).toEqual([]);
  });
});

describe('spawnRunner', () => {
  it('reports a missing binary as a failed result', async () => {
    const res = await spawnRunner.run(['plan-runner-test-no-such-binary']);
    expect(res).toEqual({ ok: false, exit_code: null, error: 'ENOENT' });
  });

  it('reports a child killed by ^C as failed when the run goes on', async () => {
    const controller = new AbortController();
    const res = await spawnRunner.run(
      [process.execPath, '-e', "process.kill(process.pid, 'SIGINT')"],
      { signal: controller.signal },
    );
    expect(res).toEqual({ ok: false, exit_code: null });
  });

  it('rejects when the run is aborted while the child runs', async () => {
    const controller = new AbortController();
    const running = spawnRunner.run(
      [process.execPath, '-e', 'setTimeout(() => {}, 10000)'],
      { signal: controller.signal },
    );
    setTimeout(() => controller.abort(), 50);
    await expect(running).rejects.toMatchObject({ name: 'AbortError' });
  });
});
