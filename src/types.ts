export interface Coordinate {
  lat: number;
  lon: number;
}

export type OsmElementType = 'node' | 'way' | 'relation';

export type OsmTags = Record<string, string>;

export interface OverpassElement {
  type?: OsmElementType;
  id?: number;
  lat?: number;
  lon?: number;
  center?: Partial<Coordinate>;
  tags: OsmTags;
}

export interface CafeRecord {
  name: string;
  lat: number;
  lon: number;
  address?: string;
  source: 'osm';
  osm_id: number | null;
  osm_type: OsmElementType | null;
}

export type FilterMode = 'strict' | 'basic';

export interface CafeSearchQuery {
  lat: number;
  lon: number;
}

export interface CafeSearchResult {
  cafes: CafeRecord[];
  radius: number;
  rounds: number;
}

export interface CafeSearchResponse {
  cafes: CafeRecord[];
  count: number;
  radius: number;
  message?: string;
}

export interface ServiceConfig {
  port: number;
  overpassUrl: string;
  userAgent: string;
  overpassTimeoutSeconds: number;
  retryDelayMs: number;
  maxRetries: number;
  defaultRadius: number;
  maxRadius: number;
  minResults: number;
  maxExpansions: number;
  filterMode: FilterMode;
}
