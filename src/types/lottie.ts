/**
 * Types for the subset of the Lottie JSON schema this converter emits.
 *
 * Property names follow the Lottie format verbatim (`ty`, `ks`, `nm`, ...).
 */

import { type Point } from './path.js';

/**
 * An RGBA color with each channel in the range 0-1.
 */
export type RgbaColor = [number, number, number, number];

/**
 * A non-animated property value.
 */
export interface StaticProperty<T> {
  a: 0;
  k: T;
  ix?: number;
}

/**
 * Bezier geometry of a single shape. `i` and `o` are relative to `v`.
 */
export interface ShapeGeometry {
  v: Point[];
  i: Point[];
  o: Point[];
  c: boolean;
}

export interface ShapeItem {
  ind: number;
  ty: 'sh';
  ix: number;
  ks: StaticProperty<ShapeGeometry>;
  nm: string;
  mn: 'ADBE Vector Shape - Group';
}

export interface StrokeItem {
  ty: 'st';
  c: StaticProperty<RgbaColor>;
  o: StaticProperty<number>;
  w: StaticProperty<number>;
  /** Line cap: 2 = round */
  lc: number;
  /** Line join: 2 = round */
  lj: number;
  bm: number;
  nm: string;
  mn: 'ADBE Vector Graphic - Stroke';
}

export interface TransformItem {
  ty: 'tr';
  p: StaticProperty<[number, number]>;
  a: StaticProperty<[number, number]>;
  s: StaticProperty<[number, number]>;
  r: StaticProperty<number>;
  o: StaticProperty<number>;
  sk: StaticProperty<number>;
  sa: StaticProperty<number>;
  nm: string;
}

export type GroupContent = ShapeItem | StrokeItem | TransformItem;

export interface GroupItem {
  ty: 'gr';
  it: GroupContent[];
  nm: string;
  /** Number of properties in the group: shape items plus the stroke */
  np: number;
  cix: number;
  bm: number;
  ix: number;
  mn: 'ADBE Vector Group';
}

export interface LayerTransform {
  o: StaticProperty<number>;
  r: StaticProperty<number>;
  p: StaticProperty<[number, number, number]>;
  a: StaticProperty<[number, number, number]>;
  s: StaticProperty<[number, number, number]>;
}

export interface ShapeLayer {
  ddd: 0;
  ind: number;
  /** Layer type 4 = shape layer */
  ty: 4;
  nm: string;
  sr: number;
  ks: LayerTransform;
  ao: 0;
  shapes: GroupItem[];
  ip: number;
  op: number;
  st: number;
  bm: number;
}

export interface LottieDocument {
  v: string;
  fr: number;
  ip: number;
  op: number;
  w: number;
  h: number;
  nm: string;
  ddd: 0;
  assets: never[];
  markers: never[];
  layers: ShapeLayer[];
}

/**
 * Shapes-only output: raw per-subpath geometry without the document envelope.
 */
export interface ShapeListEntry {
  name: string;
  /** Vertex count */
  vertices: number;
  closed: boolean;
  shape: ShapeGeometry;
}

export type ShapeList = ShapeListEntry[];
