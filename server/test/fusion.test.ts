import { describe, expect, it } from 'vitest';
import { fuse, intersects } from '../src/vision/fusion.js';
import type { ClassThresholds } from '../src/vision/vision.types.js';
import { box, detection } from './helpers.js';

const thresholds: ClassThresholds = { OBJECT: 0.5, HAND: 0.7, FACE: 0.5 };
const phone = box(0.4, 0.5, 0.6, 0.9);

describe('fuse', () => {
  it('never overlaps without both a hand and an object', () => {
    expect(fuse([], thresholds).overlapping).toBe(false);
    expect(fuse([detection('OBJECT', phone)], thresholds).overlapping).toBe(false);
    expect(fuse([detection('HAND', phone)], thresholds).overlapping).toBe(false);
    expect(fuse([detection('HAND', phone), detection('FACE', phone)], thresholds).overlapping).toBe(false);
  });

  it('flags a hand intersecting the object', () => {
    const observation = fuse(
      [detection('OBJECT', phone), detection('HAND', box(0.5, 0.7, 0.7, 0.95))],
      thresholds
    );
    expect(observation.overlapping).toBe(true);
  });

  it('does not flag disjoint boxes', () => {
    const observation = fuse(
      [detection('OBJECT', phone), detection('HAND', box(0.05, 0.1, 0.2, 0.3))],
      thresholds
    );
    expect(observation.overlapping).toBe(false);
  });

  it('picks the most confident detection per class above its threshold', () => {
    const weak = detection('HAND', box(0.5, 0.6, 0.7, 0.8), 0.65);
    const strong = detection('OBJECT', box(0.1, 0.1, 0.2, 0.2), 0.95);
    const other = detection('OBJECT', phone, 0.6);
    const observation = fuse([other, weak, strong], thresholds);
    expect(observation.object).toBe(strong);
    expect(observation.hand).toBeUndefined();
  });

  it('accepts a detection exactly at the threshold', () => {
    const hand = detection('HAND', box(0.5, 0.6, 0.7, 0.8), 0.7);
    expect(fuse([hand], thresholds).hand).toBe(hand);
  });

  it('ignores boxes with min not below max', () => {
    const inverted = detection('OBJECT', box(0.6, 0.5, 0.4, 0.9));
    expect(fuse([inverted], thresholds).object).toBeUndefined();
  });

  it('aims at the face center when a face is present', () => {
    const observation = fuse(
      [detection('OBJECT', phone), detection('FACE', box(0.2, 0.1, 0.4, 0.3))],
      thresholds
    );
    expect(observation.target?.u).toBeCloseTo(0.3);
    expect(observation.target?.v).toBeCloseTo(0.2);
  });

  it('falls back to 20% down from the top of the object', () => {
    const observation = fuse([detection('OBJECT', phone)], thresholds);
    expect(observation.target?.u).toBeCloseTo(0.5);
    expect(observation.target?.v).toBeCloseTo(0.58);
  });

  it('has no target without face or object', () => {
    expect(fuse([detection('HAND', phone)], thresholds).target).toBeUndefined();
  });

  it('returns equal results for the same input', () => {
    const input = [detection('OBJECT', phone), detection('HAND', box(0.5, 0.7, 0.7, 0.95))];
    expect(fuse(input, thresholds)).toEqual(fuse(input, thresholds));
  });
});

describe('intersects', () => {
  it('treats shared edges and corners as no overlap', () => {
    expect(intersects(box(0, 0, 0.5, 0.5), box(0.5, 0, 1, 0.5))).toBe(false);
    expect(intersects(box(0, 0, 0.5, 0.5), box(0.5, 0.5, 1, 1))).toBe(false);
  });

  it('counts containment as overlap', () => {
    expect(intersects(box(0, 0, 1, 1), box(0.4, 0.4, 0.6, 0.6))).toBe(true);
  });
});
