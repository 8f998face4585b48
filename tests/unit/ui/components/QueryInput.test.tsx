import { describe, it, expect, vi } from 'vitest';
import { render } from 'ink-testing-library';
import { QueryInput } from '../../../../src/ui/components/QueryInput.js';

const tick = () => new Promise((resolve) => setTimeout(resolve, 50));

describe('QueryInput', () => {
  it('renders the prompt and placeholder', () => {
    const { lastFrame } = render(<QueryInput onSubmit={() => {}} />);

    expect(lastFrame()).toContain('Research query:');
    expect(lastFrame()).toContain('What would you like to research?');
  });

  it('submits the typed query', async () => {
    const onSubmit = vi.fn();
    const { stdin } = render(<QueryInput onSubmit={onSubmit} />);

    await tick();
    stdin.write('ocean tides');
    await tick();
    stdin.write('\r');
    await tick();

    expect(onSubmit).toHaveBeenCalledWith('ocean tides');
  });

  it('does not submit blank input', async () => {
    const onSubmit = vi.fn();
    const { stdin } = render(<QueryInput onSubmit={onSubmit} />);

    await tick();
    stdin.write('   ');
    await tick();
    stdin.write('\r');
    await tick();

    expect(onSubmit).not.toHaveBeenCalled();
  });
});
