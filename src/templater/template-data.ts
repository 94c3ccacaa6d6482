/**
 * Checks and previews of data against a template config, before any
 * request is sent.
 */

import type { TemplateConfig, TemplateElementType } from './template-creator';

// ============================================================================
// Types
// ============================================================================

export interface TemplateDataValidation {
  /** False when a placeholder has no value or a value has the wrong type. */
  valid: boolean;
  missingPlaceholders: string[];
  extraData: string[];
  invalidTypes: string[];
  warnings: string[];
}

export interface PlaceholderChange {
  placeholder: string;
  /** 1-based. */
  slide: number;
  type: TemplateElementType;
  oldValue: string;
  newValue: string;
}

export interface UnchangedPlaceholder {
  placeholder: string;
  slide: number;
  type: TemplateElementType;
  currentValue: string;
}

export interface TemplatePreview {
  changes: PlaceholderChange[];
  unchangedPlaceholders: UnchangedPlaceholder[];
}

export interface TemplateInfo {
  name: string;
  title: string;
  createdAt: string;
  sourcePresentationId: string;
  totalSlides: number;
  totalPlaceholders: number;
  elementTypes: Partial<Record<TemplateElementType, number>>;
  placeholderNames: string[];
}

// ============================================================================
// Constants
// ============================================================================

const PREVIEW_LENGTH = 100;

const SAMPLE_IMAGE_URL = 'https://example.com/sample-image-600x400.png';

// ============================================================================
// Public API
// ============================================================================

export function validateTemplateData(config: TemplateConfig, data: Record<string, unknown>): TemplateDataValidation {
  const placeholders = config.placeholders;
  const result: TemplateDataValidation = {
    valid: true,
    missingPlaceholders: [],
    extraData: [],
    invalidTypes: [],
    warnings: [],
  };

  for (const name of Object.keys(placeholders)) {
    if (!Object.hasOwn(data, name)) result.missingPlaceholders.push(name);
  }

  for (const key of Object.keys(data)) {
    if (!Object.hasOwn(placeholders, key)) {
      result.extraData.push(key);
      result.warnings.push(`Data '${key}' does not match any placeholder`);
    }
  }

  for (const [name, value] of Object.entries(data)) {
    const placeholder = Object.hasOwn(placeholders, name) ? placeholders[name] : undefined;
    if (placeholder?.type === 'text' && typeof value !== 'string') {
      result.invalidTypes.push(`${name}: expected text, got ${typeName(value)}`);
    } else if (placeholder?.type === 'image' && typeof value !== 'string') {
      result.invalidTypes.push(`${name}: expected image URL, got ${typeName(value)}`);
    } else if (placeholder?.type === 'image' && typeof value === 'string' && !/^https?:\/\//.test(value)) {
      result.warnings.push(`${name}: image URL should start with http:// or https://`);
    }
  }

  result.valid = result.missingPlaceholders.length === 0 && result.invalidTypes.length === 0;
  return result;
}

/** Old and new value per placeholder with data, each cut to 100 characters. */
export function previewTemplateApplication(config: TemplateConfig, data: Record<string, unknown>): TemplatePreview {
  const preview: TemplatePreview = { changes: [], unchangedPlaceholders: [] };

  for (const [placeholder, info] of Object.entries(config.placeholders)) {
    const slide = info.slideIndex + 1;
    if (Object.hasOwn(data, placeholder)) {
      preview.changes.push({
        placeholder,
        slide,
        type: info.type,
        oldValue: truncate(info.example),
        newValue: truncate(valueText(data[placeholder])),
      });
    } else {
      preview.unchangedPlaceholders.push({ placeholder, slide, type: info.type, currentValue: info.example });
    }
  }
  return preview;
}

/** Markdown sample text for text placeholders, a sample URL for images. */
export function createSampleData(config: TemplateConfig): Record<string, string> {
  const sample: Record<string, string> = {};
  for (const [name, info] of Object.entries(config.placeholders)) {
    if (info.type === 'text') sample[name] = sampleMarkdown(name);
    else if (info.type === 'image') sample[name] = SAMPLE_IMAGE_URL;
    else sample[name] = `Sample data for ${info.type}`;
  }
  return sample;
}

export function describeTemplate(config: TemplateConfig): TemplateInfo {
  const elementTypes: TemplateInfo['elementTypes'] = {};
  for (const { type } of Object.values(config.placeholders)) {
    elementTypes[type] = (elementTypes[type] ?? 0) + 1;
  }
  return {
    name: config.name,
    title: config.title,
    createdAt: config.createdAt,
    sourcePresentationId: config.sourcePresentationId,
    totalSlides: config.slides.length,
    totalPlaceholders: Object.keys(config.placeholders).length,
    elementTypes,
    placeholderNames: Object.keys(config.placeholders),
  };
}

// ============================================================================
// Internal Helpers
// ============================================================================

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function valueText(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

function truncate(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

function sampleMarkdown(name: string): string {
  return [
    `# New header for ${name}`,
    '',
    '## Subheader',
    '',
    'This is **updated content** with various formatting:',
    '',
    '- List with *italic*',
    '- Item with `code`',
    '- ~~Strikethrough~~ corrected text',
  ].join('\n');
}
