import { describe, it, expect } from 'vitest';
import {
    roundCoordinate,
    toShapeGeometry,
    toShapeItem,
    buildDocument,
    buildShapeList,
    LOTTIE_VERSION,
} from './lottie-serializer.js';
import { parseSVGPath } from './path-interpreter.js';
import { resolveConfig } from '../types/config.js';
import { type Subpath } from '../types/path.js';
import { type GroupContent, type ShapeItem, type StrokeItem, type TransformItem } from '../types/lottie.js';

function makeSubpath(): Subpath {
    return {
        vertices: [[1.23456789, -2.00004], [10, 10]],
        inTangents: [[0, 0], [-0.00005, 0.00005]],
        outTangents: [[3.33333333, 0], [0, 0]],
        closed: true,
    };
}

function shapeItems(items: GroupContent[]): ShapeItem[] {
    return items.filter((item): item is ShapeItem => item.ty === 'sh');
}

function strokeOf(items: GroupContent[]): StrokeItem | undefined {
    return items.find((item): item is StrokeItem => item.ty === 'st');
}

function transformOf(items: GroupContent[]): TransformItem | undefined {
    return items.find((item): item is TransformItem => item.ty === 'tr');
}

describe('roundCoordinate', () => {

    it('rounds to four decimal places', () => {
        expect(roundCoordinate(1.23456789)).toBe(1.2346);
        expect(roundCoordinate(-1.23456789)).toBe(-1.2346);
        expect(roundCoordinate(42)).toBe(42);
    });

    it('rounds halves away from zero', () => {
        expect(roundCoordinate(0.00005)).toBe(0.0001);
        expect(roundCoordinate(-0.00005)).toBe(-0.0001);
    });

    it('never produces negative zero', () => {
        expect(Object.is(roundCoordinate(-0.00001), 0)).toBe(true);
        expect(Object.is(roundCoordinate(-0), 0)).toBe(true);
    });
});

describe('toShapeGeometry', () => {

    it('rounds every vertex and tangent component', () => {
        expect(toShapeGeometry(makeSubpath())).toEqual({
            v: [[1.2346, -2], [10, 10]],
            i: [[0, 0], [-0.0001, 0.0001]],
            o: [[3.3333, 0], [0, 0]],
            c: true,
        });
    });

    it('does not modify the subpath and is idempotent', () => {
        const subpath = makeSubpath();
        const first = toShapeGeometry(subpath);
        const second = toShapeGeometry(subpath);

        expect(second).toEqual(first);
        expect(second.v).not.toBe(first.v);
        expect(subpath).toEqual(makeSubpath());
    });
});

describe('toShapeItem', () => {

    it('wraps geometry in a static shape property', () => {
        const item = toShapeItem(makeSubpath(), 'Path 3', 2);

        expect(item.ind).toBe(2);
        expect(item.ix).toBe(3);
        expect(item.ty).toBe('sh');
        expect(item.nm).toBe('Path 3');
        expect(item.mn).toBe('ADBE Vector Shape - Group');
        expect(item.ks.a).toBe(0);
        expect(item.ks.ix).toBe(2);
        expect(item.ks.k.c).toBe(true);
    });
});

describe('buildDocument', () => {
    const subpaths = parseSVGPath('M0 0 C10 0 10 10 0 10 M5 5 L6 6 Z');

    it('fills the envelope from the default configuration', () => {
        const doc = buildDocument(subpaths, resolveConfig());

        expect(doc.v).toBe(LOTTIE_VERSION);
        expect(doc.fr).toBe(24);
        expect(doc.ip).toBe(0);
        expect(doc.op).toBe(24);
        expect(doc.w).toBe(24);
        expect(doc.h).toBe(24);
        expect(doc.nm).toBe('SVG to Lottie');
        expect(doc.assets).toEqual([]);
        expect(doc.markers).toEqual([]);
        expect(doc.layers).toHaveLength(1);
    });

    it('centers a single shape layer on the canvas', () => {
        const doc = buildDocument(subpaths, resolveConfig({ width: 100, height: 50, frameRate: 30 }));
        const [layer] = doc.layers;

        expect(layer.ty).toBe(4);
        expect(layer.ks.p.k).toEqual([50, 25, 0]);
        expect(layer.ks.a.k).toEqual([50, 25, 0]);
        expect(layer.ks.s.k).toEqual([100, 100, 100]);
        expect(layer.op).toBe(30);
        expect(doc.op).toBe(30);
    });

    it('groups shape items, then a stroke, then a transform', () => {
        const doc = buildDocument(subpaths, resolveConfig({ strokeWidth: 3, strokeColor: [1, 0, 0, 1] }));
        const [group] = doc.layers[0].shapes;

        expect(group.ty).toBe('gr');
        expect(group.np).toBe(3);
        expect(group.it.map((item) => item.ty)).toEqual(['sh', 'sh', 'st', 'tr']);

        const [first, second] = shapeItems(group.it);
        const stroke = strokeOf(group.it);
        const transform = transformOf(group.it);
        expect(first.nm).toBe('Path 1');
        expect(first.ks.k).toEqual({
            v: [[0, 0], [0, 10]],
            i: [[0, 0], [10, 0]],
            o: [[10, 0], [0, 0]],
            c: false,
        });
        expect(second.nm).toBe('Path 2');
        expect(second.ks.k.c).toBe(true);
        expect(stroke?.w.k).toBe(3);
        expect(stroke?.c.k).toEqual([1, 0, 0, 1]);
        expect(stroke?.lc).toBe(2);
        expect(stroke?.lj).toBe(2);
        expect(transform?.s.k).toEqual([100, 100]);
        expect(transform?.nm).toBe('Transform');
    });

    it('does not share the configured stroke color with the document', () => {
        const config = resolveConfig();
        const [group] = buildDocument(subpaths, config).layers[0].shapes;
        const stroke = strokeOf(group.it);

        expect(stroke?.c.k).toEqual(config.strokeColor);
        expect(stroke?.c.k).not.toBe(config.strokeColor);
    });

    it('emits a group with only stroke and transform for empty input', () => {
        const [group] = buildDocument([], resolveConfig()).layers[0].shapes;
        expect(group.np).toBe(1);
        expect(group.it.map((item) => item.ty)).toEqual(['st', 'tr']);
    });

    it('is idempotent over the same subpaths', () => {
        const config = resolveConfig();
        expect(buildDocument(subpaths, config)).toEqual(buildDocument(subpaths, config));
    });
});

describe('buildShapeList', () => {

    it('lists name, vertex count, closed flag and geometry per subpath', () => {
        expect(buildShapeList(parseSVGPath('M0 0 L10 0 L10 10 L0 0 Z m1 1 l2 2'))).toEqual([
            {
                name: 'Path 1',
                vertices: 3,
                closed: true,
                shape: {
                    v: [[0, 0], [10, 0], [10, 10]],
                    i: [[0, 0], [0, 0], [0, 0]],
                    o: [[0, 0], [0, 0], [0, 0]],
                    c: true,
                },
            },
            {
                name: 'Path 2',
                vertices: 2,
                closed: false,
                shape: {
                    v: [[1, 1], [3, 3]],
                    i: [[0, 0], [0, 0]],
                    o: [[0, 0], [0, 0]],
                    c: false,
                },
            },
        ]);
    });
});
