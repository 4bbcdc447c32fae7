// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
/**
 * GeoJSON helpers for exporting planned routes.
 */

import type { Feature, FeatureCollection, Geometry, GeoJsonProperties } from 'geojson';

export type Coord = [number, number];
export type Properties = NonNullable<GeoJsonProperties>;

export function pointFeature(coord: Coord, properties: Properties): Feature {
  return {
    type: 'Feature',
    geometry: {
      type: 'Point',
      coordinates: coord,
    },
    properties,
  };
}

/**
 * A LineString through the given points. Consecutive duplicate points are dropped;
 * a single point (e.g. a taxi which never moved) becomes a Point instead.
 */
export function pathFeature(coords: Coord[], properties: Properties): Feature {
  const path = coords.filter(
      (c, i) => i === 0 || c[0] !== coords[i - 1][0] || c[1] !== coords[i - 1][1]);
  if (path.length === 1) {
    return pointFeature(path[0], properties);
  }
  return {
    type: 'Feature',
    geometry: {
      type: 'LineString',
      coordinates: path,
    },
    properties,
  };
}

export function featureCollection(features: Feature[]): FeatureCollection<Geometry> {
  return {
    type: 'FeatureCollection',
    features,
  };
}
