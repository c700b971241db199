import { PassThrough } from 'stream';
import { ReadlineTerminal } from './terminal';

describe('ReadlineTerminal', () => {
  let input: PassThrough;
  let output: PassThrough;
  let terminal: ReadlineTerminal;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    terminal = new ReadlineTerminal(input, output);
  });

  afterEach(() => {
    terminal.close();
  });

  it('resolves with the typed line', async () => {
    const answer = terminal.ask('Select an option: ');
    input.write('4\n');

    await expect(answer).resolves.toBe('4');
  });

  it('resolves with null once input ends', async () => {
    const answer = terminal.ask('Select an option: ');
    input.end();

    await expect(answer).resolves.toBeNull();
    await expect(terminal.ask('Select an option: ')).resolves.toBeNull();
  });

  it('keeps every line of input that arrives in one chunk', async () => {
    const first = terminal.ask('Select an option: ');
    input.end('1\n40\n5\n');

    await expect(first).resolves.toBe('1');
    await expect(terminal.ask('Enter energy consumption (kWh): ')).resolves.toBe('40');
    await expect(terminal.ask('Select an option: ')).resolves.toBe('5');
    await expect(terminal.ask('Select an option: ')).resolves.toBeNull();
  });

  it('answers from lines typed ahead of the prompt', async () => {
    input.write('2\n');
    input.end('12\n');
    await new Promise(resolve => setImmediate(resolve));

    await expect(terminal.ask('Select an option: ')).resolves.toBe('2');
    await expect(terminal.ask('Enter water usage (liters): ')).resolves.toBe('12');
    await expect(terminal.ask('Select an option: ')).resolves.toBeNull();
  });

  it('writes printed lines to the output', () => {
    terminal.print('Invalid option. Please try again.');

    expect(String(output.read())).toBe('Invalid option. Please try again.\n');
  });
});
