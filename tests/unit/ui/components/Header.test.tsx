/**
 * Header Component Tests
 *
 * Unit tests for the boxed header shown above a research run.
 */
import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { Header } from '../../../../src/ui/components/Header.js';

describe('Header', () => {
  it('renders the query and depth', () => {
    const { lastFrame } = render(<Header query="ocean tides" depth="quick" />);

    expect(lastFrame()).toContain('Research Assistant');
    expect(lastFrame()).toContain('Research Query: ocean tides');
    expect(lastFrame()).toContain('Depth: quick');
    expect(lastFrame()).not.toContain('Max Sources');
  });

  it('renders the source limit when given', () => {
    const { lastFrame } = render(<Header query="ocean tides" depth="standard" maxSources={7} />);

    expect(lastFrame()).toContain('Max Sources: 7');
  });

  it('renders with custom title', () => {
    const { lastFrame } = render(<Header query="q" depth="standard" title="Custom App" />);

    expect(lastFrame()).toContain('Custom App');
    expect(lastFrame()).not.toContain('Research Assistant');
  });
});
