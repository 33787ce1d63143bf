import { renderToStaticMarkup } from 'react-dom/server';
import { describe, expect, it } from 'vitest';

import { Sparkline, sparklinePoints } from '../src/components/Sparkline';
import { buildSeries } from './helpers/series';

describe('Sparkline', () => {
  it('plots Up high and everything else low, leaving out future buckets', () => {
    expect(sparklinePoints(buildSeries('UDF'), 200, 40)).toBe('2,2 100,38');
    expect(sparklinePoints(buildSeries('-udU'), 100, 20)).toBe('2,18 34,2 66,18 98,2');
  });

  it('places a single bucket at the left edge', () => {
    expect(sparklinePoints(buildSeries('U'), 200, 40)).toBe('2,2');
  });

  it('renders a polyline only when there is something to draw', () => {
    const drawn = renderToStaticMarkup(<Sparkline series={buildSeries('UD')} />);
    expect(drawn).toContain('<polyline points="2,2 198,38"');
    expect(drawn).toContain('stroke="#FA4616"');

    const empty = renderToStaticMarkup(<Sparkline series={buildSeries('FF')} />);
    expect(empty).not.toContain('<polyline');
  });
});
