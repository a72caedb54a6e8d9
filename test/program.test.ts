import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { createProgram } from '../src/cli/program';
import { SHMConfig } from '../src/config/shm-config';
import { SREConfig } from '../src/config/sre-config';
import { quietConsole } from './helpers';

quietConsole();

function subcommands(name: string): string[] {
  const group = createProgram().commands.find((command) => command.name() === name);
  return group ? group.commands.map((command) => command.name()) : [];
}

describe('dsh', () => {
  test('groups commands by area', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual([
      'context',
      'config',
      'shm',
      'sre',
      'users',
    ]);
  });

  test.each([
    ['context', ['add', 'available', 'create', 'remove', 'show', 'switch', 'teardown', 'update']],
    ['config', ['show', 'template', 'update', 'upload', 'show-sre', 'template-sre', 'update-sre', 'upload-sre']],
    ['shm', ['deploy', 'teardown']],
    ['sre', ['deploy', 'teardown']],
    ['users', ['add', 'list', 'register', 'unregister', 'remove']],
  ])('%s has the expected subcommands', (name, expected) => {
    expect(subcommands(name)).toEqual(expected);
  });

  test('writes configuration templates to a file', async () => {
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'dsh-program-'));
    const shmFile = path.join(directory, 'shm.yaml');
    const sreFile = path.join(directory, 'sre.yaml');

    await createProgram().parseAsync(['config', 'template', '--file', shmFile], { from: 'user' });
    await createProgram().parseAsync(['config', 'template-sre', '--file', sreFile], { from: 'user' });

    expect(fs.readFileSync(shmFile, 'utf8')).toBe(SHMConfig.template());
    expect(fs.readFileSync(sreFile, 'utf8')).toBe(SREConfig.template());
  });
});
