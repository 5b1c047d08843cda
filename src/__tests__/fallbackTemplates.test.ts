import { describe, it, expect } from 'vitest';
import type { RetrievalResult } from '../advisor/advisorTypes.js';
import { diffPhones } from '../advisor/compare/diffPhones.js';
import {
  ASK_FOR_MODELS_MESSAGE,
  NO_PHONES_MESSAGE,
  comparisonVerdict,
  recommendationTitle,
  renderComparison,
  renderFallback,
  renderGeneral,
  renderRecommendation,
  renderSpecs,
} from '../advisor/render/fallbackTemplates.js';
import { makePhone } from './phoneFixtures.js';

const alpha = makePhone('Galaxy Alpha', {
  releaseDate: 'January 2024',
  display: '6.8 inches, AMOLED',
  battery: '5000 mAh',
  camera: '200 MP main',
  ram: '12 GB',
  storage: '256GB',
  price: '$1199',
  chipset: 'Chip X',
  os: 'Android 14',
});

const beta = makePhone('Galaxy Beta', {
  display: '6.1 inches, LCD',
  battery: '3900 mAh',
  camera: '50 MP main',
  price: '$799',
});

function retrieval(overrides: Partial<RetrievalResult>): RetrievalResult {
  return {
    question: 'test question',
    intent: 'general',
    criteria: {},
    resolvedNames: [],
    records: [],
    ...overrides,
  };
}

describe('renderSpecs', () => {
  it('should list every attribute', () => {
    expect(renderSpecs(alpha)).toBe([
      'Galaxy Alpha specifications:',
      '',
      '• Display: 6.8 inches, AMOLED',
      '• Battery: 5000 mAh',
      '• Camera: 200 MP main',
      '• RAM: 12 GB',
      '• Storage: 256GB',
      '• Chipset: Chip X',
      '• OS: Android 14',
      '• Price: $1199',
      '• Released: January 2024',
    ].join('\n'));
  });

  it('should show N/A for empty fields', () => {
    const text = renderSpecs(makePhone('Galaxy Gamma', { chipset: '', releaseDate: ' ' }));

    expect(text.split('\n')).toContain('• Chipset: N/A');
    expect(text.split('\n')).toContain('• Released: N/A');
  });
});

describe('renderComparison', () => {
  it('should render side-by-side blocks and a camera verdict', () => {
    const text = renderComparison(diffPhones(alpha, beta), { focus: 'camera' }, 'compare for photos');

    expect(text).toBe([
      'Comparing Galaxy Alpha vs Galaxy Beta:',
      '',
      'Display:',
      '  • Galaxy Alpha: 6.8 inches, AMOLED',
      '  • Galaxy Beta: 6.1 inches, LCD',
      '',
      'Battery:',
      '  • Galaxy Alpha: 5000 mAh',
      '  • Galaxy Beta: 3900 mAh',
      '',
      'Camera:',
      '  • Galaxy Alpha: 200 MP main',
      '  • Galaxy Beta: 50 MP main',
      '',
      'Price:',
      '  • Galaxy Alpha: $1199',
      '  • Galaxy Beta: $799',
      '',
      'Recommendation:',
      'Galaxy Alpha has a better camera (200MP vs 50MP) and is recommended for photography.',
    ].join('\n'));
  });
});

describe('comparisonVerdict', () => {
  it('should pick the larger battery', () => {
    expect(comparisonVerdict(diffPhones(beta, alpha), { focus: 'battery' }, 'battery?')).toBe(
      'Galaxy Alpha has better battery life (5000mAh vs 3900mAh).'
    );
  });

  it('should report ties', () => {
    const twin = makePhone('Galaxy Twin', { camera: '200 MP main' });

    expect(comparisonVerdict(diffPhones(alpha, twin), { focus: 'camera' }, 'camera')).toBe(
      'Both phones have similar camera capabilities. Consider other factors like price and features.'
    );
    expect(comparisonVerdict(diffPhones(alpha, makePhone('Galaxy Twin', { battery: '5000 mAh' })), { focus: 'battery' }, '')).toBe(
      'Both phones have similar battery capacity.'
    );
  });

  it('should use the camera verdict when the question mentions photos', () => {
    expect(comparisonVerdict(diffPhones(beta, alpha), {}, 'Which takes better Photos?')).toBe(
      'Galaxy Alpha has a better camera (200MP vs 50MP) and is recommended for photography.'
    );
  });

  it('should recommend the first-listed model otherwise', () => {
    expect(comparisonVerdict(diffPhones(beta, alpha), { focus: 'display' }, 'screens')).toBe(
      'Galaxy Beta is the newer model with improved overall performance and features.'
    );
  });

  it('should recommend the first-listed model when values cannot be parsed', () => {
    const unknown = makePhone('Galaxy Unknown', { battery: 'TBA' });

    expect(comparisonVerdict(diffPhones(alpha, unknown), { focus: 'battery' }, '')).toBe(
      'Galaxy Alpha is the newer model with improved overall performance and features.'
    );
  });
});

describe('recommendationTitle', () => {
  it('should prefer a focus title over a budget title', () => {
    expect(recommendationTitle({ focus: 'battery', priceMax: 900 })).toBe('Best Samsung phones for battery life:');
    expect(recommendationTitle({ focus: 'camera' })).toBe('Best Samsung phones for photography:');
  });

  it('should keep the budget or generic title for a display focus', () => {
    expect(recommendationTitle({ focus: 'display', priceMax: 800 })).toBe('Best Samsung phones under $800:');
    expect(recommendationTitle({ focus: 'display' })).toBe('Based on your requirements, here are my recommendations:');
  });

  it('should show a whole-dollar budget', () => {
    expect(recommendationTitle({ priceMax: 999.5 })).toBe('Best Samsung phones under $999:');
  });

  it('should fall back to a generic title', () => {
    expect(recommendationTitle({})).toBe('Based on your requirements, here are my recommendations:');
  });
});

describe('renderRecommendation', () => {
  it('should number the picks and close with the first one', () => {
    const text = renderRecommendation([alpha, beta], { priceMax: 1200 });

    expect(text).toBe([
      'Best Samsung phones under $1200:',
      '',
      '1. **Galaxy Alpha**',
      '   • Price: $1199',
      '   • Battery: 5000 mAh',
      '   • Camera: 200 MP main',
      '   • Display: 6.8 inches, AMOLED',
      '',
      '2. **Galaxy Beta**',
      '   • Price: $799',
      '   • Battery: 3900 mAh',
      '   • Camera: 50 MP main',
      '   • Display: 6.1 inches, LCD',
      '',
      'Top recommendation: Galaxy Alpha offers the best value for your needs.',
    ].join('\n'));
  });
});

describe('renderFallback', () => {
  it('should return the no-phones message for an empty retrieval', () => {
    expect(renderFallback(retrieval({ intent: 'comparison' }))).toBe(NO_PHONES_MESSAGE);
    expect(renderFallback(retrieval({ intent: 'general' }))).toBe(NO_PHONES_MESSAGE);
  });

  it('should render specs for a comparison with a single record', () => {
    expect(renderFallback(retrieval({ intent: 'comparison', records: [alpha] }))).toBe(renderSpecs(alpha));
  });

  it('should render the comparison payload', () => {
    const comparison = diffPhones(alpha, beta);
    const result = retrieval({ intent: 'comparison', records: [alpha, beta], comparison });

    expect(renderFallback(result)).toBe(renderComparison(comparison, {}, 'test question'));
  });

  it('should render ranked picks for a recommendation', () => {
    const result = retrieval({
      intent: 'recommendation',
      criteria: { focus: 'camera' },
      records: [beta, alpha],
      recommendation: { criteria: { focus: 'camera' }, candidates: [beta, alpha], topPicks: [alpha, beta] },
    });

    expect(renderFallback(result).startsWith('Best Samsung phones for photography:\n\n1. **Galaxy Alpha**')).toBe(true);
  });

  it('should treat general questions by record count', () => {
    expect(renderFallback(retrieval({ records: [beta] }))).toBe(renderSpecs(beta));
    expect(renderFallback(retrieval({ records: [beta, alpha] }))).toBe(renderRecommendation([beta, alpha], {}));
  });

  it('should render specs for a specs question', () => {
    expect(renderFallback(retrieval({ intent: 'specs', records: [beta, alpha] }))).toBe(renderSpecs(beta));
  });

});

describe('renderGeneral', () => {
  it('should ask for a model when there are no records', () => {
    expect(renderGeneral([], {})).toBe(ASK_FOR_MODELS_MESSAGE);
    expect(ASK_FOR_MODELS_MESSAGE).toBe(
      "Please ask about specific Samsung phone models or describe what you're looking for."
    );
  });

  it('should list at most three records', () => {
    const gamma = makePhone('Galaxy Gamma');
    const delta = makePhone('Galaxy Delta');

    expect(renderGeneral([alpha, beta, gamma, delta], {})).toBe(renderRecommendation([alpha, beta, gamma], {}));
  });
});
