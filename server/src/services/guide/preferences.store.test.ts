import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PreferencesStore } from './preferences.store.js';

describe('PreferencesStore', () => {
  it('enables everything in English by default', () => {
    const store = new PreferencesStore();

    assert.deepEqual(store.get('u1'), {
      categories: { nature: true, religion: true, culture: true, history: true, must_visit: true },
      language: 'en',
    });
    assert.equal(store.hasDisabledAllCategories('u1'), false);
  });

  it('applies partial updates', () => {
    const store = new PreferencesStore();

    store.update('u1', { categories: { nature: false } });
    const prefs = store.update('u1', { language: 'ru' });

    assert.equal(prefs.categories.nature, false);
    assert.equal(prefs.categories.history, true);
    assert.equal(prefs.language, 'ru');
    assert.equal(store.getLanguage('u1'), 'ru');
  });

  it('toggles one category', () => {
    const store = new PreferencesStore();

    store.toggle('u1', 'culture');
    assert.deepEqual(store.enabledCategories('u1'), ['nature', 'religion', 'history', 'must_visit']);

    store.toggle('u1', 'culture');
    assert.equal(store.get('u1').categories.culture, true);
  });

  it('detects an explicit empty selection', () => {
    const store = new PreferencesStore();
    store.update('u1', {
      categories: { nature: false, religion: false, culture: false, history: false, must_visit: false },
    });

    assert.equal(store.hasDisabledAllCategories('u1'), true);
    assert.deepEqual(store.selectedPlaceTypes('u1'), []);
  });

  it('flattens enabled categories into unique place types', () => {
    const store = new PreferencesStore();
    store.update('u1', { categories: { nature: false, religion: false, culture: false } });

    assert.deepEqual(store.selectedPlaceTypes('u1'), ['museum', 'tourist_attraction', 'point_of_interest']);
  });

  it('returns copies', () => {
    const store = new PreferencesStore();
    store.get('u1').categories.nature = false;

    assert.equal(store.get('u1').categories.nature, true);
  });
});
