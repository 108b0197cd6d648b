export const ORIENTATIONS = ['landscape', 'portrait', 'squarish', 'any'] as const;
export type Orientation = (typeof ORIENTATIONS)[number];

export const COLORS = [
  'black_and_white',
  'black',
  'white',
  'yellow',
  'orange',
  'red',
  'purple',
  'magenta',
  'green',
  'teal',
  'blue',
  'any',
] as const;
export type ColorFilter = (typeof COLORS)[number];

export type ImageVariant = 'regular' | 'full' | 'raw';

export interface ImageRecord {
  readonly id: string;
  readonly regularURL: string;
  readonly fullURL: string;
  readonly rawURL: string;
  readonly width: number;
  readonly height: number;
  readonly altText: string;   // may be empty
  readonly color: string;     // dominant colour tag, e.g. "#a3b1c2"
  readonly likes: number;
}

export interface SearchQuery {
  readonly term: string;
  readonly orientation: Orientation;
  readonly color: ColorFilter;
  readonly minWidth: number;
  readonly minHeight: number;
  readonly maxResults: number;
}

export type CollectionStatus =
  | 'running'
  | 'stopped_by_cap'
  | 'stopped_by_exhaustion'
  | 'stopped_by_empty_page'
  | 'stopped_by_error';

export type TerminalStatus = Exclude<CollectionStatus, 'running'>;

export interface CollectionProgress {
  page: number;
  collected: number;
  maxResults: number;
  fraction: number;
}

export function variantUrl(record: ImageRecord, variant: ImageVariant): string {
  switch (variant) {
    case 'regular':
      return record.regularURL;
    case 'full':
      return record.fullURL;
    case 'raw':
      return record.rawURL;
  }
}
