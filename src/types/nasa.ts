export interface NeoBrowsePage {
  size?: number;
  total_elements?: number;
  total_pages: number;
  number?: number;
  [key: string]: unknown;
}

/**
 * One record of the browse listing. Only `id` is relied upon (it is the join
 * key); every other field is carried through untouched.
 */
export interface NeoSummary {
  id: string;
  neo_reference_id?: string;
  name?: string;
  nasa_jpl_url?: string;
  absolute_magnitude_h?: number;
  is_potentially_hazardous_asteroid?: boolean;
  [key: string]: unknown;
}

export interface NeoBrowse {
  page: NeoBrowsePage;
  near_earth_objects: NeoSummary[];
}
