// ============================================================================
// loanpack - Library Export
// ============================================================================

// Ambient
export * from './errors';
export * from './rolling-logger';
export * from './settings';
export * from './app-context';
export * from './http-client';
export * from './tool-paths';

// Loans
export * from './loan-types';
export * from './vendor-client';
export * from './book-paths';
export * from './cover-image';

// Audio
export * from './chapter-timeline';
export * from './asset-fetcher';
export * from './id3-tags';
export * from './audio-tagger';
export * from './odm-markers';
export * from './ffmpeg-bridge';
export * from './audiobook-processor';

// EPUB
export * from './opf-builder';
export * from './epub-content';
export * from './epub-zip';
export * from './epub-assembler';
export * from './ebook-processor';

// Pipeline
export * from './pipeline';
