import { PassThrough } from 'stream';
import { ReadlinePrompt } from '@/cli/readlinePrompt';

describe('ReadlinePrompt', () => {
  let input: PassThrough;
  let output: PassThrough;
  let written: string;
  let prompt: ReadlinePrompt;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    written = '';
    output.on('data', (chunk: Buffer) => {
      written += chunk.toString();
    });
    prompt = new ReadlinePrompt(input, output);
  });

  afterEach(() => {
    prompt.close();
  });

  it('should answer one line per question when a script arrives in a single chunk', async () => {
    input.write('d\n1\n100\n');

    await expect(prompt.ask('Option: ')).resolves.toBe('d');
    await expect(prompt.ask('Account number: ')).resolves.toBe('1');
    await expect(prompt.ask('Amount: ')).resolves.toBe('100');
    expect(written).toContain('Account number: ');
  });

  it('should drain queued lines, including an unterminated last one, before answering null', async () => {
    input.end('x\n  q  ');

    await expect(prompt.ask('Option: ')).resolves.toBe('x');
    await expect(prompt.ask('Option: ')).resolves.toBe('q');
    await expect(prompt.ask('Option: ')).resolves.toBeNull();
  });

  it('should answer null to a pending question when input ends', async () => {
    const answer = prompt.ask('Option: ');

    input.end();

    await expect(answer).resolves.toBeNull();
  });

  it('should answer null to a pending question when closed', async () => {
    const answer = prompt.ask('Option: ');

    prompt.close();

    await expect(answer).resolves.toBeNull();
    await expect(prompt.ask('Option: ')).resolves.toBeNull();
  });
});
