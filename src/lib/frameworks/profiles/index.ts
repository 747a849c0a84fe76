/**
 * Framework Profiles
 * Joins the static profile data with each profile's signal checks
 */

import definitions from './profiles.json';
import { isFieldType } from '../../fields/field.types';
import {
  FRAMEWORK_CATEGORIES,
  FrameworkCategory,
  FrameworkProfile,
  ProfileDefinition,
  ProfileSignals,
} from '../framework.types';
import { bootstrapSignals, tailwindSignals } from './css.signals';
import { drupalViewsSignals, wordpressSignals } from './cms.signals';
import { shopifySignals, woocommerceSignals } from './ecommerce.signals';
import { djangoAdminSignals, nextjsSignals, reactSignals, vueSignals } from './framework.signals';
import { openGraphSignals, schemaOrgSignals, twitterCardsSignals } from './universal.signals';

export * from './css.signals';
export * from './cms.signals';
export * from './ecommerce.signals';
export * from './framework.signals';
export * from './universal.signals';

const SIGNALS: Record<string, ProfileSignals> = {
  schema_org: schemaOrgSignals,
  opengraph: openGraphSignals,
  twitter_cards: twitterCardsSignals,
  django_admin: djangoAdminSignals,
  nextjs: nextjsSignals,
  react: reactSignals,
  vuejs: vueSignals,
  drupal_views: drupalViewsSignals,
  woocommerce: woocommerceSignals,
  shopify: shopifySignals,
  tailwind: tailwindSignals,
  bootstrap: bootstrapSignals,
  wordpress: wordpressSignals,
};

function isCategory(value: string): value is FrameworkCategory {
  return FRAMEWORK_CATEGORIES.some((category) => category === value);
}

function toDefinition(raw: (typeof definitions)[number]): ProfileDefinition {
  if (!isCategory(raw.category)) {
    throw new Error(`Profile ${raw.id} has unknown category: ${raw.category}`);
  }

  const fieldMappings: ProfileDefinition['fieldMappings'] = Object.fromEntries(
    Object.entries(raw.fieldMappings).filter(([fieldType]) => isFieldType(fieldType))
  );

  return {
    id: raw.id,
    name: raw.name,
    category: raw.category,
    itemSelectorHints: raw.itemSelectorHints,
    fieldMappings,
    recommendation: raw.recommendation,
  };
}

/**
 * Load every profile in registry order: universal conventions, then
 * frameworks and platforms, with the generic CMS last
 */
export function loadProfiles(): readonly FrameworkProfile[] {
  return Object.freeze(
    definitions.map((raw) => {
      const signals = SIGNALS[raw.id];
      if (!signals) {
        throw new Error(`Profile ${raw.id} has no signal checks`);
      }
      return Object.freeze({ ...toDefinition(raw), ...signals });
    })
  );
}
