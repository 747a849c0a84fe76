/**
 * Application Framework Signals
 * Server-rendered admin screens and client-side frameworks
 */

import { ProfileSignals } from '../framework.types';

function versionFrom(html: string, patterns: RegExp[]): string | null {
  for (const pattern of patterns) {
    const match = html.match(pattern);
    if (match) {
      return match[1];
    }
  }
  return null;
}

export const djangoAdminSignals: ProfileSignals = {
  detect({ html }) {
    let score = 0;
    if (html.includes('django-admin')) score += 40;
    if (html.includes('grp-')) score += 30; // Grappelli
    if (html.includes('suit-')) score += 30; // Django Suit
    if (html.includes('/admin/')) score += 20;
    if (html.includes('djdt')) score += 15; // Debug toolbar
    if (html.includes('field-') && html.includes('th class="field-')) score += 20;
    return score;
  },
};

export const nextjsSignals: ProfileSignals = {
  detect({ html }) {
    let score = 0;
    if (html.includes('__NEXT_DATA__')) score += 50;
    if (html.includes('__next')) score += 30;
    if (html.includes('data-nextjs')) score += 25;
    if (html.includes('/_next/')) score += 20;
    if (html.includes('next/script') || html.includes('next/image')) score += 15;
    return score;
  },
};

export const reactSignals: ProfileSignals = {
  detect({ html }) {
    let score = 0;
    if (html.includes('data-reactroot')) score += 40;
    if (html.includes('data-react-')) score += 35;
    if (html.includes('__REACT')) score += 30;
    if (html.includes('id="root"')) score += 20;
    if (html.includes('id="app"') && (html.includes('data-react') || html.includes('React'))) {
      score += 15;
    }
    if (html.includes('react-dom') || html.includes('react.js')) score += 25;
    return score;
  },

  getVersion({ html }) {
    return versionFrom(html, [
      /react(?:-dom)?@(\d+\.\d+\.\d+)/,
      /react(?:-dom)?\/(\d+\.\d+\.\d+)\//,
    ]);
  },
};

export const vueSignals: ProfileSignals = {
  detect({ html }) {
    let score = 0;
    if (html.includes('v-for=')) score += 45;
    if (html.includes('v-if=')) score += 30;
    if (html.includes('v-bind:') || html.includes(':key=')) score += 25;
    if (html.includes('@click=') || html.includes('v-on:')) score += 20;
    if (html.includes('__VUE__')) score += 30;
    if (html.toLowerCase().includes('vue.js') || html.includes('vue@')) score += 25;
    return score;
  },

  getVersion({ html }) {
    return versionFrom(html, [/vue@(\d+\.\d+\.\d+)/, /vue\/(\d+\.\d+\.\d+)\//]);
  },
};
