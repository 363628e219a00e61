// CoverageJSON (https://covjson.org/spec/) subset for point-series coverages.

export type LangString = { en: string };

export type Parameter = {
  type: 'Parameter';
  description: LangString;
  unit: { label: LangString; symbol: string };
  observedProperty: { id?: string; label: LangString };
};

export type NdArray = {
  type: 'NdArray';
  dataType: 'float';
  axisNames: ['t'];
  shape: [number];
  values: (number | null)[];
};

export type ReferenceSystemConnection =
  | {
      coordinates: ['x', 'y'];
      system: { type: 'GeographicCRS'; id: string };
    }
  | {
      coordinates: ['t'];
      system: { type: 'TemporalRS'; calendar: 'Gregorian' };
    };

export type PointSeriesDomain = {
  type: 'Domain';
  domainType: 'PointSeries';
  axes: {
    t: { values: string[] };
    x: { values: [number | null] };
    y: { values: [number | null] };
  };
  referencing: ReferenceSystemConnection[];
};

export type Coverage = {
  type: 'Coverage';
  domain: PointSeriesDomain;
  parameters: Record<string, Parameter>;
  ranges: Record<string, NdArray>;
  location: { type: 'Point'; coordinates: [number | null, number | null] };
};
