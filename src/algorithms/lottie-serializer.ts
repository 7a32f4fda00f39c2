import { type Point, type Subpath } from '../types/path.js';
import {
    type GroupItem,
    type LottieDocument,
    type ShapeGeometry,
    type ShapeItem,
    type ShapeList,
    type StrokeItem,
    type TransformItem,
} from '../types/lottie.js';
import { type ConverterConfig } from '../types/config.js';

export const LOTTIE_VERSION = '5.5.2';

const PRECISION = 10000;

/**
 * Rounds to 4 decimal places, halves away from zero. Never returns negative zero.
 */
export function roundCoordinate(value: number): number {
    const rounded = (Math.sign(value) * Math.round(Math.abs(value) * PRECISION)) / PRECISION;
    return rounded === 0 ? 0 : rounded;
}

function roundPoints(points: Point[]): Point[] {
    return points.map(([x, y]): Point => [roundCoordinate(x), roundCoordinate(y)]);
}

export function subpathName(index: number): string {
    return `Path ${String(index + 1)}`;
}

/**
 * Rounded vertex and tangent arrays of one subpath. The subpath is not modified.
 */
export function toShapeGeometry(subpath: Subpath): ShapeGeometry {
    return {
        v: roundPoints(subpath.vertices),
        i: roundPoints(subpath.inTangents),
        o: roundPoints(subpath.outTangents),
        c: subpath.closed,
    };
}

export function toShapeItem(subpath: Subpath, name: string, index: number): ShapeItem {
    return {
        ind: index,
        ty: 'sh',
        ix: index + 1,
        ks: { a: 0, k: toShapeGeometry(subpath), ix: 2 },
        nm: name,
        mn: 'ADBE Vector Shape - Group',
    };
}

function strokeItem(config: ConverterConfig): StrokeItem {
    return {
        ty: 'st',
        c: { a: 0, k: [...config.strokeColor], ix: 3 },
        o: { a: 0, k: 100, ix: 4 },
        w: { a: 0, k: config.strokeWidth, ix: 5 },
        lc: 2,
        lj: 2,
        bm: 0,
        nm: 'Stroke',
        mn: 'ADBE Vector Graphic - Stroke',
    };
}

function transformItem(): TransformItem {
    return {
        ty: 'tr',
        p: { a: 0, k: [0, 0], ix: 2 },
        a: { a: 0, k: [0, 0], ix: 1 },
        s: { a: 0, k: [100, 100], ix: 3 },
        r: { a: 0, k: 0, ix: 6 },
        o: { a: 0, k: 100, ix: 7 },
        sk: { a: 0, k: 0, ix: 4 },
        sa: { a: 0, k: 0, ix: 5 },
        nm: 'Transform',
    };
}

/**
 * Wraps every subpath, a stroke and an identity transform in one group on one
 * shape layer centered on a `width` x `height` canvas, lasting one second.
 */
export function buildDocument(subpaths: Subpath[], config: ConverterConfig): LottieDocument {
    const { width, height, frameRate } = config;
    const shapes = subpaths.map((subpath, index) => toShapeItem(subpath, subpathName(index), index));

    const group: GroupItem = {
        ty: 'gr',
        it: [...shapes, strokeItem(config), transformItem()],
        nm: 'Group',
        np: shapes.length + 1,
        cix: 2,
        bm: 0,
        ix: 1,
        mn: 'ADBE Vector Group',
    };

    return {
        v: LOTTIE_VERSION,
        fr: frameRate,
        ip: 0,
        op: frameRate,
        w: width,
        h: height,
        nm: config.name,
        ddd: 0,
        assets: [],
        markers: [],
        layers: [{
            ddd: 0,
            ind: 0,
            ty: 4,
            nm: 'Shape',
            sr: 1,
            ks: {
                o: { a: 0, k: 100, ix: 11 },
                r: { a: 0, k: 0, ix: 10 },
                p: { a: 0, k: [width / 2, height / 2, 0], ix: 2 },
                a: { a: 0, k: [width / 2, height / 2, 0], ix: 1 },
                s: { a: 0, k: [100, 100, 100], ix: 6 },
            },
            ao: 0,
            shapes: [group],
            ip: 0,
            op: frameRate,
            st: 0,
            bm: 0,
        }],
    };
}

/**
 * Per-subpath geometry without the document envelope.
 */
export function buildShapeList(subpaths: Subpath[]): ShapeList {
    return subpaths.map((subpath, index) => ({
        name: subpathName(index),
        vertices: subpath.vertices.length,
        closed: subpath.closed,
        shape: toShapeGeometry(subpath),
    }));
}
