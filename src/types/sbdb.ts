export interface SbdbOrbitElement {
  name: string;
  value: string | number | null;
  label?: string;
  title?: string;
  units?: string | null;
  sigma?: string | null;
}

export interface SbdbOrbit {
  epoch?: string;
  elements?: SbdbOrbitElement[];
  [key: string]: unknown;
}

export interface SbdbObject {
  spkid?: string;
  object_name?: string;
  fullname?: string;
  des?: string;
  prefix?: string;
  [key: string]: unknown;
}

export interface SbdbResponse {
  object?: SbdbObject;
  orbit?: SbdbOrbit;
  [key: string]: unknown;
}

/** Body of one small-body database lookup, kept verbatim. */
export type OrbitalRecord = SbdbResponse;
