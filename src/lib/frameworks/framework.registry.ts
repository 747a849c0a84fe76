/**
 * Framework Registry
 * Scores a document against every known profile and maps fields through
 * the best match
 */

import { env } from '../../config/env';
import { DocumentTree, Element, selectWithin } from '../dom';
import type { FieldType } from '../fields/field.types';
import {
  DetectionInput,
  FrameworkDetection,
  FrameworkMatch,
  FrameworkProfile,
} from './framework.types';
import { loadProfiles } from './profiles';

const ATTR_MARKER = '::attr(';

export const FRAMEWORK_PROFILES: readonly FrameworkProfile[] = loadProfiles();

function clampScore(score: number): number {
  return Math.max(0, Math.min(100, Math.round(score)));
}

function toInput($: DocumentTree, item?: Element | null): DetectionInput {
  return { html: $.html(), $, item };
}

/**
 * Look up a profile by id
 */
export function getFrameworkProfile(id: string): FrameworkProfile | null {
  return FRAMEWORK_PROFILES.find((profile) => profile.id === id) ?? null;
}

/**
 * Every profile scoring above zero, highest first; ties keep registry order
 */
export function detectFrameworks($: DocumentTree, item?: Element | null): FrameworkDetection[] {
  const input = toInput($, item);

  return FRAMEWORK_PROFILES.map((profile) => ({
    profile,
    score: clampScore(profile.detect(input)),
  }))
    .filter((detection) => detection.score > 0)
    .sort((a, b) => b.score - a.score);
}

/**
 * Best profile at or above minScore, or null
 */
export function detectFramework(
  $: DocumentTree,
  item?: Element | null,
  minScore: number = env.FRAMEWORK_MIN_SCORE
): FrameworkProfile | null {
  const [best] = detectFrameworks($, item);
  return best && best.score >= minScore ? best.profile : null;
}

/**
 * Serializable matches with advertised versions
 */
export function describeFrameworks($: DocumentTree, item?: Element | null): FrameworkMatch[] {
  const input = toInput($, item);

  return detectFrameworks($, item).map(({ profile, score }) => {
    const match: FrameworkMatch = {
      profileId: profile.id,
      name: profile.name,
      category: profile.category,
      score,
      confidence: score / 100,
    };
    const version = profile.getVersion?.(input);
    if (version) {
      match.version = version;
    }
    return match;
  });
}

/**
 * First mapping for the field whose CSS part matches inside the item
 */
export function getFrameworkFieldSelector(
  $: DocumentTree,
  profile: FrameworkProfile,
  item: Element,
  fieldType: FieldType
): string | null {
  for (const pattern of profile.fieldMappings[fieldType] ?? []) {
    const markerIndex = pattern.indexOf(ATTR_MARKER);
    const css = (markerIndex >= 0 ? pattern.slice(0, markerIndex) : pattern).trim();
    if (!css) {
      continue;
    }

    try {
      if (selectWithin($, item, css).length > 0) {
        return pattern;
      }
    } catch (error) {
      console.warn(`⚠️  Invalid ${profile.id} mapping "${pattern}":`, error);
    }
  }
  return null;
}

/**
 * Whether a selector overlaps one of the profile's item hints or field mappings
 */
export function isFrameworkPattern(selector: string, profile: FrameworkProfile): boolean {
  const trimmed = selector.trim();
  if (!trimmed) {
    return false;
  }

  const patterns = [
    ...profile.itemSelectorHints,
    ...Object.values(profile.fieldMappings)
      .flatMap((mappings) => mappings ?? [])
      .map((pattern) => pattern.split(ATTR_MARKER)[0].trim()),
  ];
  return patterns.some((pattern) => trimmed.includes(pattern) || pattern.includes(trimmed));
}
