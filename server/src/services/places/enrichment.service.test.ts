/**
 * Enrichment Service Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { EnrichmentService, translateOrKeep } from './enrichment.service.js';
import { toPlaceRecord } from './place-normalizer.js';
import {
  ADDRESS_NOT_AVAILABLE,
  ADDRESS_PLACEHOLDER,
  toErrorText,
  type Coordinates,
  type GeocodingProvider,
  type PlaceRecord,
  type ReverseGeocodeResult,
  type TranslationProvider,
} from './types.js';

class FakeGeocoder implements GeocodingProvider {
  calls = 0;
  constructor(private readonly result: ReverseGeocodeResult | Error) {}

  async reverseGeocode(_position: Coordinates): Promise<ReverseGeocodeResult> {
    this.calls++;
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

class DictionaryTranslator implements TranslationProvider {
  calls: string[] = [];
  constructor(private readonly dictionary: Record<string, string>) {}

  async translate(text: string): Promise<string> {
    this.calls.push(text);
    return this.dictionary[text] ?? toErrorText('no translation');
  }
}

function freshPlace(): PlaceRecord {
  return toPlaceRecord(
    { id: 'ChIJ1', title: 'Храм Светог Саве', type: 'church', position: { lat: 44.798, lng: 20.469 } },
    { lat: 44.8024, lng: 20.4656 }
  );
}

describe('EnrichmentService', () => {
  it('geocodes, keeps originals and translates name and address', async () => {
    const geocoder = new FakeGeocoder({ formattedAddress: 'Крушедолска 2а, Београд', components: {} });
    const translator = new DictionaryTranslator({
      'Храм Светог Саве': 'Church of Saint Sava',
      'Крушедолска 2а, Београд': 'Krusedolska 2a, Belgrade',
    });
    const service = new EnrichmentService(geocoder, translator);
    const place = freshPlace();
    assert.equal(place.address, ADDRESS_PLACEHOLDER);

    const enriched = await service.enrich(place, 'user-1');

    assert.equal(enriched, place);
    assert.equal(place.title, 'Church of Saint Sava');
    assert.equal(place.originalTitle, 'Храм Светог Саве');
    assert.equal(place.address, 'Krusedolska 2a, Belgrade');
    assert.equal(place.originalAddress, 'Крушедолска 2а, Београд');
    assert.equal(place.enriched, true);
    assert.equal(geocoder.calls, 1);
    assert.deepEqual(translator.calls.sort(), ['Крушедолска 2а, Београд', 'Храм Светог Саве'].sort());
  });

  it('is idempotent once enriched', async () => {
    const geocoder = new FakeGeocoder({ formattedAddress: 'Street 1, City', components: {} });
    const translator = new DictionaryTranslator({});
    const service = new EnrichmentService(geocoder, translator);
    const place = freshPlace();

    await service.enrich(place, 'user-1');
    await service.enrich(place, 'user-1');
    await service.enrich(place, 'user-1');

    assert.equal(geocoder.calls, 1);
    assert.equal(translator.calls.length, 2);
  });

  it('marks an English-named place enriched even when translation returns the same text', async () => {
    const geocoder = new FakeGeocoder({ formattedAddress: 'Main Street 1', components: {} });
    const translator = new DictionaryTranslator({ 'National Museum': 'National Museum', 'Main Street 1': 'Main Street 1' });
    const service = new EnrichmentService(geocoder, translator);
    const place = toPlaceRecord({ id: 'm', title: 'National Museum', type: 'museum', position: { lat: 0, lng: 0 } });

    await service.enrich(place, 'user-1');
    await service.enrich(place, 'user-1');

    assert.equal(place.enriched, true);
    assert.equal(place.title, place.originalTitle);
    assert.equal(geocoder.calls, 1);
  });

  it('keeps untranslated text when translation fails', async () => {
    const geocoder = new FakeGeocoder({ formattedAddress: 'Ulica 5', components: {} });
    const translator = new DictionaryTranslator({});
    const place = freshPlace();

    await new EnrichmentService(geocoder, translator).enrich(place, 'user-1');

    assert.equal(place.title, 'Храм Светог Саве');
    assert.equal(place.address, 'Ulica 5');
    assert.equal(place.enriched, true);
  });

  it('uses the not-available sentinel when the geocoder throws', async () => {
    const geocoder = new FakeGeocoder(new Error('socket hang up'));
    const translator = new DictionaryTranslator({});
    const place = freshPlace();

    await new EnrichmentService(geocoder, translator).enrich(place, 'user-1');

    assert.equal(place.originalAddress, ADDRESS_NOT_AVAILABLE);
    assert.equal(place.address, ADDRESS_NOT_AVAILABLE);
  });

  it('shares one in-flight enrichment between concurrent callers', async () => {
    const geocoder = new FakeGeocoder({ formattedAddress: 'Street 1, City', components: {} });
    const translator = new DictionaryTranslator({});
    const service = new EnrichmentService(geocoder, translator);
    const place = freshPlace();

    const [first, second] = await Promise.all([
      service.enrich(place, 'user-1'),
      service.enrich(place, 'user-1'),
    ]);

    assert.equal(first, second);
    assert.equal(geocoder.calls, 1);
    assert.equal(translator.calls.length, 2);
  });

  it('enriches a second record with the same id instead of reusing the first', async () => {
    const geocoder = new FakeGeocoder({ formattedAddress: 'Крушедолска 2а, Београд', components: {} });
    const translator = new DictionaryTranslator({ 'Храм Светог Саве': 'Church of Saint Sava' });
    const service = new EnrichmentService(geocoder, translator);
    const previous = freshPlace();
    const replacement = freshPlace();

    const [fromPrevious, fromReplacement] = await Promise.all([
      service.enrich(previous, 'user-1'),
      service.enrich(replacement, 'user-1'),
    ]);

    assert.equal(fromPrevious, previous);
    assert.equal(fromReplacement, replacement);
    assert.equal(replacement.enriched, true);
    assert.equal(replacement.title, 'Church of Saint Sava');
    assert.equal(replacement.address, 'Крушедолска 2а, Београд');
    assert.equal(geocoder.calls, 2);
  });
});

describe('translateOrKeep', () => {
  it('returns the source text when the translator throws', async () => {
    const translator: TranslationProvider = {
      translate: async () => {
        throw new Error('boom');
      },
    };
    assert.equal(await translateOrKeep(translator, 'Trg'), 'Trg');
  });

  it('returns the source text for Error:-prefixed results', async () => {
    const translator: TranslationProvider = { translate: async () => 'Error: rate limited' };
    assert.equal(await translateOrKeep(translator, 'Trg'), 'Trg');
  });
});
