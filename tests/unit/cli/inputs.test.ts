// ============================================================================
// CLI Input Reader Tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { readSlides, readTemplateGeometry } from '../../../src/cli/inputs';
import { PayloadDecodeError } from '../../../src/main/errors';

const fixture = (name: string) => fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));

describe('readTemplateGeometry', () => {
  it('should default the template id to the file name', async () => {
    const template = await readTemplateGeometry(fixture('template.json'));

    expect(template.id).toBe('template');
    expect(template.name).toBe('Quarterly Review');
    expect(template.unit).toBe('inch');
    expect(template.layouts.map((l) => l.index)).toEqual([0, 1, 2]);
    expect(template.layouts[1].placeholders).toHaveLength(2);
  });

  it('should reject geometry without layouts', async () => {
    await expect(readTemplateGeometry(fixture('slides.json'))).rejects.toThrow(PayloadDecodeError);
  });

  it('should reject repeated layout indices', async () => {
    await expect(readTemplateGeometry(fixture('template-duplicate.json'))).rejects.toThrow(
      /layouts\.2\.index: Duplicate layout index 1$/,
    );
  });

  it('should report unreadable files', async () => {
    await expect(readTemplateGeometry(fixture('nope.json'))).rejects.toThrow(/^Cannot read .*nope\.json$/);
  });
});

describe('readSlides', () => {
  it('should decode loose slide JSON', async () => {
    const slides = await readSlides(fixture('slides.json'));

    expect(slides).toEqual([
      {
        heading: 'Slide 1: Where we are',
        keyMessage: 'A steady quarter',
        payload: { kind: 'bullets', bullets: ['Revenue grew', ['Mostly in the north region'], 'Costs held flat'] },
      },
      {
        heading: 'Slide 2: Sales by quarter',
        payload: {
          kind: 'chart',
          chart: { chartType: 'bar', categories: ['Q1', 'Q2'], series: [{ name: 'Sales', values: [12, 15] }] },
        },
      },
    ]);
  });

  it('should name the slide that fails to decode', async () => {
    await expect(readSlides(fixture('slides-invalid.json'))).rejects.toThrow(
      'Slide 2: Slide content must be an object',
    );
  });

  it('should reject a file that is not a slide list', async () => {
    await expect(readSlides(fixture('template.json'))).rejects.toThrow(
      /must hold an array of slides or \{ "slides": \[\.\.\.\] \}$/,
    );
  });
});
