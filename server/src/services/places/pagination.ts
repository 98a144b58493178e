/**
 * Place cards and pagination
 * Builds the view of one place in a session and the action payloads
 * that move through the list.
 */

import type { Lang, MessageKey, TranslationVars } from '../i18n/index.js';
import type { PlaceRecord } from './types.js';

export const NUMBER_EMOJIS = ['1️⃣', '2️⃣', '3️⃣', '4️⃣', '5️⃣'] as const;

export const GOOGLE_MAPS_SEARCH_URL = 'https://www.google.com/maps/search/';

export type PlaceAction = 'next' | 'more';

export interface ActionButton {
  label: string;
  payload: string;
}

export interface PlaceCard {
  index: number;
  total: number;
  emoji: string;
  primaryName: string;
  /** Present only when it differs from primaryName */
  secondaryName?: string;
  address: string;
  /** Kilometres with one decimal */
  distanceKm: string;
  type: string;
  website?: string;
  websiteLabel: string;
  mapsUrl: string;
  actions: {
    tellMore: ActionButton;
    next: ActionButton;
    showOnMap: { label: string; url: string };
  };
}

export type Translate = (key: MessageKey, vars?: TranslationVars) => string;

export function nextIndex(current: number, length: number): number {
  if (length <= 0) return 0;
  return (current + 1) % length;
}

export function actionPayload(action: PlaceAction, index: number): string {
  return `${action}_${index}`;
}

export function parseActionPayload(payload: string): { action: PlaceAction; index: number } | null {
  const match = /^(next|more)_(\d+)$/.exec(payload);
  if (!match) return null;

  const action: PlaceAction = match[1] === 'next' ? 'next' : 'more';
  return { action, index: Number(match[2]) };
}

export function buildMapsUrl(position: PlaceRecord['position']): string {
  const params = new URLSearchParams({ api: '1', query: `${position.lat},${position.lng}` });
  return `${GOOGLE_MAPS_SEARCH_URL}?${params.toString()}`;
}

/**
 * Russian users see the original name first
 */
export function orderNames(place: PlaceRecord, lang: Lang): { primary: string; secondary?: string } {
  const original = place.originalTitle ?? place.title;
  const [primary, secondary] = lang === 'ru'
    ? [original, place.title]
    : [place.title, original];

  return secondary !== primary ? { primary, secondary } : { primary };
}

export function buildPlaceCard(
  place: PlaceRecord,
  index: number,
  total: number,
  lang: Lang,
  t: Translate
): PlaceCard {
  const names = orderNames(place, lang);
  const isLast = index >= total - 1;
  const mapsUrl = buildMapsUrl(place.position);

  return {
    index,
    total,
    emoji: NUMBER_EMOJIS[index] ?? String(index + 1),
    primaryName: names.primary,
    ...(names.secondary !== undefined && { secondaryName: names.secondary }),
    address: place.address,
    distanceKm: (place.distance / 1000).toFixed(1),
    type: place.type,
    ...(place.website ? { website: place.website } : {}),
    websiteLabel: t('website_label'),
    mapsUrl,
    actions: {
      tellMore: { label: t('tell_more_btn'), payload: actionPayload('more', index) },
      next: {
        label: t(isLast ? 'back_to_first' : 'next_location'),
        payload: actionPayload('next', nextIndex(index, total)),
      },
      showOnMap: { label: t('show_maps_btn'), url: mapsUrl },
    },
  };
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"]/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Chat-style HTML (b, i only); every provider-sourced value is escaped
 */
export function renderPlaceCardHtml(card: PlaceCard): string {
  let text = `${card.emoji} <b>${escapeHtml(card.primaryName)}</b>`;
  if (card.secondaryName) {
    text += `\n<i>${escapeHtml(card.secondaryName)}</i>`;
  }

  text += `\n\n📍 ${escapeHtml(card.address)}\n`;
  text += `🚶 ${card.distanceKm} km\n`;
  text += `🏷️ ${escapeHtml(card.type)}\n`;

  if (card.website) {
    text += `\n🌐 <b>${escapeHtml(card.websiteLabel)}:</b> ${escapeHtml(card.website)}`;
  }

  return text;
}
