/**
 * Tests for template data checks
 */

import { describe, it, expect } from 'vitest';
import type { TemplateConfig } from './template-creator';
import { createSampleData, describeTemplate, previewTemplateApplication, validateTemplateData } from './template-data';

const config: TemplateConfig = {
  name: 'Quarterly',
  sourcePresentationId: 'authoring-1',
  title: 'Q4 Review',
  createdAt: '2026-10-19T00:00:00.000Z',
  slides: [
    { slideId: 'a1', slideIndex: 0, replaceableElements: [] },
    { slideId: 'a3', slideIndex: 2, replaceableElements: [] },
  ],
  placeholders: {
    headline: {
      type: 'text',
      slideIndex: 0,
      description: 'Text content (supports Markdown and HTML comments)',
      example: '# Results',
      originalExample: 'Results',
    },
    logo: {
      type: 'image',
      slideIndex: 0,
      description: 'Image URL (must be publicly accessible)',
      example: '![Logo](https://example.com/logo.png)',
      originalExample: 'https://example.com/logo.png',
    },
    figures: {
      type: 'table',
      slideIndex: 2,
      description: 'Table data (list of rows or dictionary)',
      example: 'Sample table content',
      originalExample: 'Sample table content',
    },
  },
};

// ============================================================================
// validateTemplateData
// ============================================================================

describe('validateTemplateData', () => {
  it('should accept data with a value of the right type for every placeholder', () => {
    expect(
      validateTemplateData(config, {
        headline: 'Up 20%',
        logo: 'https://example.com/new.png',
        figures: [['a', 1]],
      })
    ).toEqual({ valid: true, missingPlaceholders: [], extraData: [], invalidTypes: [], warnings: [] });
  });

  it('should report missing, extra and mistyped values', () => {
    expect(validateTemplateData(config, { headline: 7, logo: 'logo.png', note: 'x' })).toEqual({
      valid: false,
      missingPlaceholders: ['figures'],
      extraData: ['note'],
      invalidTypes: ['headline: expected text, got number'],
      warnings: [
        "Data 'note' does not match any placeholder",
        'logo: image URL should start with http:// or https://',
      ],
    });
  });

  it('should reject a non-string image value', () => {
    const result = validateTemplateData(config, { headline: 'x', logo: ['a'], figures: {} });

    expect(result.valid).toBe(false);
    expect(result.invalidTypes).toEqual(['logo: expected image URL, got array']);
  });

  it('should stay valid when only extra data is present', () => {
    const result = validateTemplateData(config, { headline: 'x', logo: 'https://example.com/a.png', figures: [], x: 1 });

    expect(result.valid).toBe(true);
    expect(result.extraData).toEqual(['x']);
  });
});

// ============================================================================
// previewTemplateApplication
// ============================================================================

describe('previewTemplateApplication', () => {
  it('should pair old and new values and list untouched placeholders', () => {
    const longValue = 'y'.repeat(150);

    expect(previewTemplateApplication(config, { headline: longValue, figures: { Q1: 3 } })).toEqual({
      changes: [
        { placeholder: 'headline', slide: 1, type: 'text', oldValue: '# Results', newValue: `${'y'.repeat(100)}...` },
        { placeholder: 'figures', slide: 3, type: 'table', oldValue: 'Sample table content', newValue: '{"Q1":3}' },
      ],
      unchangedPlaceholders: [
        { placeholder: 'logo', slide: 1, type: 'image', currentValue: '![Logo](https://example.com/logo.png)' },
      ],
    });
  });
});

// ============================================================================
// createSampleData / describeTemplate
// ============================================================================

describe('createSampleData', () => {
  it('should produce a sample value for each placeholder type', () => {
    const sample = createSampleData(config);

    expect(Object.keys(sample)).toEqual(['headline', 'logo', 'figures']);
    expect(sample.headline?.split('\n')[0]).toBe('# New header for headline');
    expect(sample.logo).toBe('https://example.com/sample-image-600x400.png');
    expect(sample.figures).toBe('Sample data for table');
  });

  it('should produce data that passes validation', () => {
    expect(validateTemplateData(config, createSampleData(config)).valid).toBe(true);
  });
});

describe('describeTemplate', () => {
  it('should count slides, placeholders and element types', () => {
    expect(describeTemplate(config)).toEqual({
      name: 'Quarterly',
      title: 'Q4 Review',
      createdAt: '2026-10-19T00:00:00.000Z',
      sourcePresentationId: 'authoring-1',
      totalSlides: 2,
      totalPlaceholders: 3,
      elementTypes: { text: 1, image: 1, table: 1 },
      placeholderNames: ['headline', 'logo', 'figures'],
    });
  });
});
