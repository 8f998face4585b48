import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { ResearchProgress } from '../../../../src/ui/components/ResearchProgress.js';

describe('ResearchProgress', () => {
  it('renders with default message', () => {
    const { lastFrame } = render(<ResearchProgress />);

    expect(lastFrame()).toContain('Researching...');
  });

  it('shows the latest activity', () => {
    const { lastFrame } = render(<ResearchProgress activity="Searching: ocean tides" />);

    expect(lastFrame()).toContain('Searching: ocean tides');
  });

  it('keeps the label once the spinner starts', async () => {
    const { lastFrame } = render(<ResearchProgress message="Working..." />);

    await new Promise((resolve) => setTimeout(resolve, 100));

    expect(lastFrame()).toContain('Working...');
  });
});
