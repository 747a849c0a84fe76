/**
 * E-commerce Signals
 */

import { ProfileSignals } from '../framework.types';

export const woocommerceSignals: ProfileSignals = {
  detect({ html }) {
    let score = 0;
    const hasWoo = html.includes('woocommerce');

    if (hasWoo) score += 30;
    if (html.includes('class="woocommerce')) score += 20;
    if (html.includes('product-card') || html.includes('wc-product')) score += 25;
    if (html.includes('woocommerce-loop-product')) score += 30;
    if (html.includes('product_title') || html.includes('woocommerce-product-title')) score += 20;
    if (html.includes('wc-') || html.includes('woocommerce.js') || html.includes('woocommerce.min.js')) {
      score += 15;
    }
    if (html.includes('woocommerce-Price-amount')) score += 25;
    if (html.includes('price') && (html.includes('amount') || html.includes('currency'))) score += 10;
    if (html.includes('add_to_cart') || html.includes('add-to-cart')) score += 15;
    if ((html.includes('wp-content') || html.includes('wp-includes')) && hasWoo) score += 20;

    return score;
  },
};

export const shopifySignals: ProfileSignals = {
  detect({ html }) {
    let score = 0;
    if (html.includes('product-')) score += 30;
    if (html.includes('collection-')) score += 25;
    if (html.toLowerCase().includes('shopify')) score += 25;
    if (html.includes('cart') && html.includes('product')) score += 10;
    if (html.includes('variant')) score += 10;
    return score;
  },
};
