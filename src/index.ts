/**
 * slides-model-kit
 *
 * Typed Google Slides model, its JSON codec, batch-request builders and
 * the templater built on them.
 */

// Model
export * from './model/wire';
export * from './model/primitives';
export * from './model/styles';
export * from './model/text';
export * from './model/elements';
export * from './model/page';
export * from './model/presentation';

// Requests
export * from './requests/types';
export * from './requests/field-mask';
export * from './requests/element-requests';
export * from './requests/text-requests';
export * from './requests/page-requests';
export * from './requests/object-requests';

// Services
export * from './services/slides-client';
export * from './services/google-auth';
export * from './services/presentation-service';
export * from './services/markdown-slides';

// Templater
export * from './templater/placeholders';
export * from './templater/template-filler';
export * from './templater/template-creator';
export * from './templater/template-data';
export * from './templater/batch';
export * from './templater/markdown-text';
export * from './templater/markdown-deck';

// Ambient
export * from './errors';
export * from './config';
export * from './utils/log-sanitizer';
export * from './utils/retry';
export * from './utils/circuit-breaker';
export * from './utils/units';
export * from './utils/object-id';
