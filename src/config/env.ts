import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Input limits
  MAX_HTML_LENGTH: parseInt(process.env.MAX_HTML_LENGTH || String(10 * 1024 * 1024), 10), // 10MB

  // Structural Pattern Scanner
  SCANNER_MIN_REPEAT: parseInt(process.env.SCANNER_MIN_REPEAT || '3', 10),
  SCANNER_MAX_CANDIDATES: parseInt(process.env.SCANNER_MAX_CANDIDATES || '15', 10),
  SCANNER_CHROME_COUNT_THRESHOLD: parseInt(process.env.SCANNER_CHROME_COUNT_THRESHOLD || '100', 10), // Counts above this with no sample URL are navigation noise

  // Framework Signature Matcher
  FRAMEWORK_MIN_SCORE: parseInt(process.env.FRAMEWORK_MIN_SCORE || '40', 10),

  // Preview & field suggestions
  PREVIEW_LIMIT: parseInt(process.env.PREVIEW_LIMIT || '3', 10),
  FIELD_SAMPLE_ITEMS: parseInt(process.env.FIELD_SAMPLE_ITEMS || '25', 10), // Items inspected when pooling field suggestions
} as const;

export default env;
