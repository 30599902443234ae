import { describe, it, expect } from 'vitest';
import { SubsetIdentifier } from '../core/subset-identifier';
import { FakeSceneHost } from './fixtures/fake-scene';

function sign(value: number): number {
  return value === 0 ? 0 : value > 0 ? 1 : -1;
}

describe('SubsetIdentifier', () => {
  const host = new FakeSceneHost();
  const brick = host.addMaterial('Brick');
  const glass = host.addMaterial('Glass');
  const glassCopy = host.addMaterial('Glass');
  const door = host.addNode({ name: 'Door' });
  const wheel = host.addNode({ name: 'Wheel' });

  it('builds equal keys for the same subset name, material and animating node', () => {
    const a = new SubsetIdentifier('Body', brick, door);
    const b = new SubsetIdentifier('Body', brick, door);

    expect(a.key).toBe(b.key);
    expect(a.equals(b)).toBe(true);
    expect(SubsetIdentifier.compare(a, b)).toBe(0);
  });

  it('tells materials with the same name apart by id', () => {
    const a = new SubsetIdentifier('', glass, null);
    const b = new SubsetIdentifier('', glassCopy, null);

    expect(a.equals(b)).toBe(false);
    expect(SubsetIdentifier.compare(a, b)).toBe(-1);
  });

  it('orders by subset name before material', () => {
    const a = new SubsetIdentifier('A', glass, null);
    const b = new SubsetIdentifier('B', brick, null);
    expect(SubsetIdentifier.compare(a, b)).toBe(-1);
  });

  it('puts the null material and the static subset first', () => {
    expect(SubsetIdentifier.compare(new SubsetIdentifier('', null, null), new SubsetIdentifier('', brick, null))).toBe(-1);
    expect(SubsetIdentifier.compare(new SubsetIdentifier('', brick, wheel), new SubsetIdentifier('', brick, null))).toBe(1);
  });

  it('is a total order', () => {
    const identifiers: SubsetIdentifier[] = [];
    for (const name of ['', 'Body', 'Roof']) {
      for (const material of [null, brick, glass, glassCopy]) {
        for (const node of [null, door, wheel]) {
          identifiers.push(new SubsetIdentifier(name, material, node));
        }
      }
    }

    for (const a of identifiers) {
      for (const b of identifiers) {
        expect(sign(SubsetIdentifier.compare(a, b)) + sign(SubsetIdentifier.compare(b, a))).toBe(0);
        expect(SubsetIdentifier.compare(a, b) === 0).toBe(a.equals(b));
        for (const c of identifiers) {
          if (SubsetIdentifier.compare(a, b) < 0 && SubsetIdentifier.compare(b, c) < 0) {
            expect(SubsetIdentifier.compare(a, c)).toBeLessThan(0);
          }
        }
      }
    }
  });
});
