import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { I18nService } from './i18n.service.js';
import { MESSAGE_KEYS } from './i18n.types.js';

function serviceWith(files: Record<string, unknown>): I18nService {
  const dir = mkdtempSync(join(tmpdir(), 'i18n-'));
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, name), JSON.stringify(content));
  }
  return new I18nService(dir);
}

describe('I18nService', () => {
  it('ships every key in every language', () => {
    const i18n = new I18nService();

    for (const key of MESSAGE_KEYS) {
      assert.notEqual(i18n.t(key, 'en'), key, `en: ${key}`);
      assert.notEqual(i18n.t(key, 'ru'), key, `ru: ${key}`);
    }
    assert.deepEqual(i18n.getSupportedLanguages(), ['en', 'ru']);
  });

  it('interpolates variables and leaves unknown ones', () => {
    const i18n = serviceWith({
      'en.json': { cooldown: 'Wait {{seconds}}s, {{name}}' },
      'ru.json': {},
    });

    assert.equal(i18n.t('cooldown', 'en', { seconds: 42 }), 'Wait 42s, {{name}}');
  });

  it('falls back to English, then to the key', () => {
    const i18n = serviceWith({
      'en.json': { lost_track: 'Lost you' },
      'ru.json': { try_again: 'Ещё раз' },
    });

    assert.equal(i18n.t('lost_track', 'ru'), 'Lost you');
    assert.equal(i18n.t('try_again', 'ru'), 'Ещё раз');
    assert.equal(i18n.t('voice_tired', 'ru'), 'voice_tired');
  });

  it('skips a language whose file is missing or malformed', () => {
    const i18n = serviceWith({ 'en.json': { lost_track: 'Lost you' } });

    assert.deepEqual(i18n.getSupportedLanguages(), ['en']);
    assert.equal(i18n.t('lost_track', 'ru'), 'Lost you');
  });
});
