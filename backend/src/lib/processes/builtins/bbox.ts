import { isRecord } from '../../db/json.js';
import type { ProcessDefinition } from '../types.js';

export type BBox = [number, number, number, number];

type Position = [number, number];

function isPosition(value: unknown): value is Position {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number' &&
    Number.isFinite(value[0]) &&
    Number.isFinite(value[1])
  );
}

function collectPositions(coordinates: unknown, depth: number, out: Position[]) {
  if (depth === 0) {
    if (!isPosition(coordinates)) throw new Error('Invalid GeoJSON position');
    out.push(coordinates);
    return;
  }
  if (!Array.isArray(coordinates)) throw new Error('Invalid GeoJSON coordinates');
  for (const entry of coordinates) collectPositions(entry, depth - 1, out);
}

const COORDINATE_DEPTH: Record<string, number> = {
  Point: 0,
  MultiPoint: 1,
  LineString: 1,
  MultiLineString: 2,
  Polygon: 2,
  MultiPolygon: 3,
};

function positionsOf(geometry: unknown, out: Position[]) {
  if (!isRecord(geometry) || typeof geometry.type !== 'string') {
    throw new Error('geometry must be a GeoJSON geometry object');
  }
  if (geometry.type === 'GeometryCollection') {
    if (!Array.isArray(geometry.geometries)) throw new Error('GeometryCollection needs a geometries array');
    for (const member of geometry.geometries) positionsOf(member, out);
    return;
  }
  const depth = COORDINATE_DEPTH[geometry.type];
  if (depth === undefined) throw new Error(`Unsupported geometry type "${geometry.type}"`);
  collectPositions(geometry.coordinates, depth, out);
}

export function boundingBox(geometry: unknown): BBox {
  const positions: Position[] = [];
  positionsOf(geometry, positions);
  if (!positions.length) throw new Error('geometry has no positions');

  let [minX, minY] = positions[0];
  let [maxX, maxY] = positions[0];
  for (const [x, y] of positions) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return [minX, minY, maxX, maxY];
}

export const bboxProcess: ProcessDefinition = {
  id: 'bbox',
  title: 'Bounding box',
  description: 'Computes the bounding box of a GeoJSON geometry.',
  version: '1.0.0',
  keywords: ['geometry', 'geojson'],
  jobControlOptions: ['async-execute', 'sync-execute', 'dismiss'],
  outputTransmission: ['value'],
  inputs: {
    geometry: {
      title: 'Geometry',
      description: 'GeoJSON geometry (any type, including GeometryCollection).',
      schema: { type: 'object' },
    },
  },
  outputs: {
    bbox: {
      title: 'Bounding box',
      description: '[minX, minY, maxX, maxY]',
      schema: { type: 'array', items: { type: 'number' }, minItems: 4, maxItems: 4 },
    },
  },
  execute: async inputs => ({ bbox: boundingBox(inputs.geometry) }),
};
