/**
 * Compliance keywords configuration for article filtering
 */

import type { KeywordSets } from '../types/index.js';

export const COMPLIANCE_KEYWORDS = {
  native: [
    // Competition
    '독점규제및공정거래에관한법률',
    '공정거래법',
    '대리점법',
    '하도급법',

    // Corporate
    '상법',

    // Labour
    '노동법',
    '노조법',
    '근로기준법',
    '노랑봉투법',
    '중대재해재법',

    // Privacy
    '정보보호법',
  ],

  foreign: [
    // Anti-corruption & privacy
    'FCPA',
    'GDPR',

    // Immigration
    'U.S. visas',
    'US visas',
    'immigration',

    // Trade
    'tariffs',
  ],
} as const satisfies KeywordSets;
