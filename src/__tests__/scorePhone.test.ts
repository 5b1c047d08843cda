import { describe, it, expect } from 'vitest';
import { rankPhones, scorePhone } from '../advisor/rank/scorePhone.js';
import { makePhone } from './phoneFixtures.js';

const PLAIN = {
  battery: '4000 mAh',
  camera: '50 MP main',
  ram: '8 GB',
  display: '6.1 inches, PLS LCD, 60Hz',
  price: '$600',
};

describe('scorePhone', () => {
  it('should add the normalized battery, camera and RAM terms', () => {
    const phone = makePhone('Phone A', PLAIN);

    // 4000/1000 + 50/50 + 8/4
    expect(scorePhone(phone, undefined, {})).toBe(7);
  });

  it('should add the focus bonus', () => {
    const phone = makePhone('Phone A', PLAIN);

    expect(scorePhone(phone, 'battery', {})).toBe(15);
    expect(scorePhone(phone, 'camera', {})).toBe(9);
    expect(scorePhone(phone, 'overall', {})).toBe(7);
  });

  it('should score display features', () => {
    const both = makePhone('Phone A', { ...PLAIN, display: 'Dynamic AMOLED 2X, 120Hz' });
    const amoledOnly = makePhone('Phone B', { ...PLAIN, display: 'Super AMOLED, 90Hz' });

    expect(scorePhone(both, 'display', {})).toBe(10);
    expect(scorePhone(amoledOnly, 'display', {})).toBe(8);
  });

  it('should reward prices within budget and penalize prices above it', () => {
    const phone = makePhone('Phone A', PLAIN);

    expect(scorePhone(phone, undefined, { priceMax: 600 })).toBe(10);
    expect(scorePhone(phone, undefined, { priceMax: 599 })).toBe(2);
  });

  it('should treat unparseable fields as no contribution', () => {
    const phone = makePhone('Phone A', {
      battery: 'unknown',
      camera: '',
      ram: 'N/A',
      price: 'TBA',
    });

    expect(scorePhone(phone, 'battery', { priceMax: 500 })).toBe(0);
  });

  it('should never decrease when battery capacity grows', () => {
    const capacities = [3000, 3900, 4500, 5000, 6000];
    const scores = capacities.map(mah =>
      scorePhone(makePhone('Phone A', { ...PLAIN, battery: `${mah} mAh` }), 'battery', { priceMax: 700 })
    );

    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeGreaterThanOrEqual(scores[i - 1]);
    }
  });
});

describe('rankPhones', () => {
  it('should return at most three records, best first', () => {
    const phones = [
      makePhone('Small', { ...PLAIN, battery: '3000 mAh' }),
      makePhone('Large', { ...PLAIN, battery: '6000 mAh' }),
      makePhone('Medium', { ...PLAIN, battery: '4500 mAh' }),
      makePhone('Tiny', { ...PLAIN, battery: '2000 mAh' }),
    ];

    expect(rankPhones(phones, 'battery', {}).map(phone => phone.modelName)).toEqual([
      'Large',
      'Medium',
      'Small',
    ]);
  });

  it('should keep input order for equal scores', () => {
    const phones = ['First', 'Second', 'Third', 'Fourth'].map(name => makePhone(name, PLAIN));

    expect(rankPhones(phones, undefined, {}).map(phone => phone.modelName)).toEqual([
      'First',
      'Second',
      'Third',
    ]);
  });

  it('should return an empty list for no records', () => {
    expect(rankPhones([], 'camera', {})).toEqual([]);
  });
});
