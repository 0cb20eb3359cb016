import { describe, expect, it } from 'vitest';

import { createProgram } from '../../src/cli/program.js';

const generateCommand = () => {
  const command = createProgram().commands.find((c) => c.name() === 'generate');
  if (!command) throw new Error('generate command missing');
  return command;
};

describe('generate command', () => {
  it('uses -c for the correct-option count and -C for the config path', () => {
    const options = generateCommand().options;
    expect(options.find((o) => o.short === '-c')?.long).toBe('--num-correct');
    expect(options.find((o) => o.short === '-C')?.long).toBe('--config');
  });

  it('rejects a non-positive correct-option count', async () => {
    const program = createProgram();
    const generate = program.commands.find((c) => c.name() === 'generate');
    generate?.exitOverride().configureOutput({ writeErr: () => undefined });

    await expect(program.parseAsync(['generate', '-c', '0'], { from: 'user' })).rejects.toThrow(
      /Expected a positive integer/
    );
  });
});
