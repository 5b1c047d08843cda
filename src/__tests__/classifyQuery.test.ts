import { describe, it, expect } from 'vitest';
import {
  classifyQuery,
  detectIntent,
  extractFocus,
  extractPriceMax,
} from '../advisor/criteria/classifyQuery.js';

describe('classifyQuery', () => {
  it('should classify a photography comparison', () => {
    const result = classifyQuery('compare Galaxy S23 Ultra and S22 Ultra for photography');

    expect(result).toEqual({
      intent: 'comparison',
      criteria: { focus: 'camera' },
    });
  });

  it('should classify a budget battery recommendation', () => {
    const result = classifyQuery('which Samsung phone has the best battery under $1000');

    expect(result).toEqual({
      intent: 'recommendation',
      criteria: { focus: 'battery', priceMax: 1000 },
    });
  });

  it('should leave criteria empty when the question carries no signal', () => {
    expect(classifyQuery('Galaxy A54 release date')).toEqual({
      intent: 'general',
      criteria: {},
    });
  });
});

describe('detectIntent', () => {
  it('should detect comparison keywords', () => {
    expect(detectIntent('Galaxy S24 vs S23')).toBe('comparison');
    expect(detectIntent('What is the difference between the A54 and A55?')).toBe('comparison');
  });

  it('should prefer comparison over recommendation', () => {
    expect(detectIntent('Which is better, the S24 or the S23?')).toBe('comparison');
  });

  it('should detect recommendation keywords', () => {
    expect(detectIntent('What should I buy for gaming?')).toBe('recommendation');
    expect(detectIntent('Recommend a compact phone')).toBe('recommendation');
  });

  it('should detect specs keywords', () => {
    expect(detectIntent('What are the specs of Samsung Galaxy S23 Ultra?')).toBe('specs');
    expect(detectIntent('Tell me about the Galaxy A54')).toBe('specs');
  });

  it('should match keywords anywhere in the text', () => {
    expect(detectIntent('s24vs s23 camera')).toBe('comparison');
    expect(detectIntent('Is the A54 a good laptop replacement?')).toBe('recommendation');
  });

  it('should fall back to general without a keyword', () => {
    expect(detectIntent('Galaxy A54 battery life')).toBe('general');
  });

  it('should be case-insensitive', () => {
    expect(detectIntent('COMPARE the Z Fold 6 and Z Flip 6')).toBe('comparison');
  });
});

describe('extractPriceMax', () => {
  it('should read amounts with and without a dollar sign', () => {
    expect(extractPriceMax('best phone under $800')).toBe(800);
    expect(extractPriceMax('best phone under 800')).toBe(800);
    expect(extractPriceMax('anything below $ 650?')).toBe(650);
  });

  it('should accept thousands separators', () => {
    expect(extractPriceMax('flagships under $1,200')).toBe(1200);
  });

  it('should let a "below" amount override an "under" amount', () => {
    expect(extractPriceMax('under $800 or maybe below $600')).toBe(600);
  });

  it('should return undefined without a price phrase', () => {
    expect(extractPriceMax('cheapest phone with 1000 nits')).toBeUndefined();
    expect(extractPriceMax('thunder 500')).toBeUndefined();
  });
});

describe('extractFocus', () => {
  it('should detect each focus group', () => {
    expect(extractFocus('a long lasting phone')).toBe('battery');
    expect(extractFocus('good for photos')).toBe('camera');
    expect(extractFocus('biggest screen')).toBe('display');
  });

  it('should let later groups override earlier ones', () => {
    expect(extractFocus('great battery and camera')).toBe('camera');
    expect(extractFocus('best screen and battery')).toBe('display');
  });

  it('should return undefined without a focus term', () => {
    expect(extractFocus('fastest chipset')).toBeUndefined();
  });
});
