/**
 * Default rule tables and thresholds.
 *
 * Patterns are written as regex literals and stored by their `.source`
 * so they read the same here as they do in a JSON override file.
 * Matching always runs against lowercased text.
 */

import type { FilterRules, QualityThresholds } from "./schema.js";

/**
 * Default transcript filter rules.
 */
export const DEFAULT_FILTER_RULES: FilterRules = {
  version: "1.0.0",
  snippetLength: 50,

  profanity: {
    category: "profanity",
    severity: "high",
    confidence: 0.95,
    rules: [
      {
        pattern: /\b(?:f[u*]ck|shit|ass(?:hole)?|damn|crap)\b/.source,
        flags: "",
        message: "Strong profanity detected",
      },
      {
        pattern: /\b(?:bitch|bastard|arsehole)\b/.source,
        flags: "",
        message: "Moderate profanity detected",
      },
      {
        pattern: /\b(?:hell|piss(?:ed)?)\b/.source,
        flags: "",
        message: "Mild profanity detected",
      },
      {
        pattern: /\b(?:retard|stupid|idiot|moron)\b/.source,
        flags: "i",
        message: "Offensive language detected",
      },
    ],
  },

  violence: {
    category: "violence",
    severity: "high",
    confidence: 0.85,
    rules: [
      {
        pattern: /\bkill\b.*\b(?:person|people|victim|them)\b/.source,
        flags: "i",
        message: "Violence reference",
      },
      {
        pattern: /\b(?:murder|assault|attack|stabbing|shooting)\b/.source,
        flags: "i",
        message: "Violence terminology",
      },
      {
        pattern: /\b(?:rape|sexual assault)\b/.source,
        flags: "i",
        message: "Sexual violence reference",
      },
      {
        pattern: /graphic(?:ally)? (?:violent|graphic)|brutal/.source,
        flags: "i",
        message: "Explicit violence description",
      },
    ],
  },

  harassment: {
    category: "harassment",
    severity: "high",
    confidence: 0.8,
    rules: [
      {
        pattern: /\b(?:hate|stupid|dumb|loser)\s+(?:all\s+)?(?:people|them|you|women|men)\b/.source,
        flags: "i",
        message: "Derogatory language",
      },
      {
        pattern: /should (?:die|be killed|burn|hang)/.source,
        flags: "i",
        message: "Threatening language",
      },
    ],
  },

  sponsor: {
    keywords: [
      { keyword: "sponsored", priority: 3 },
      { keyword: "sponsor", priority: 3 },
      { keyword: "ad", priority: 2 },
      { keyword: "advertisement", priority: 3 },
      { keyword: "partner", priority: 2 },
      { keyword: "partnership", priority: 2 },
      { keyword: "affiliate", priority: 2 },
      { keyword: "affiliate link", priority: 3 },
      { keyword: "discount code", priority: 2 },
      { keyword: "promo code", priority: 2 },
      { keyword: "use code", priority: 2 },
      { keyword: "promotion", priority: 1 },
      { keyword: "click link below", priority: 2 },
      { keyword: "buy now", priority: 1 },
      { keyword: "shop now", priority: 1 },
      { keyword: "purchase", priority: 1 },
      { keyword: "brand", priority: 1 },
      { keyword: "product placement", priority: 3 },
      { keyword: "in collaboration with", priority: 2 },
      { keyword: "brought to you by", priority: 3 },
      { keyword: "this video is brought", priority: 3 },
    ],
    flagMinPriority: 2,
    maxFlaggedMatches: 3,
    highPriority: 3,
    highPriorityConfidence: 0.9,
    confidence: 0.7,
    severity: "low",
  },

  misinformation: {
    category: "misinformation",
    severity: "medium",
    confidence: 0.75,
    rules: [
      {
        pattern: /no scientific evidence|scientifically unproven|false claim/.source,
        flags: "i",
        message: "Disputed claim acknowledged",
      },
      {
        pattern: /conspiracy|illuminati|cover.?up|hidden truth/.source,
        flags: "i",
        message: "Conspiracy theory language",
      },
      {
        pattern: /cure(?:s|d)? (?:cancer|diabetes|autism|covid)/.source,
        flags: "i",
        message: "Unverified medical claims",
      },
      {
        pattern: /miracle|guaranteed cure|secret formula/.source,
        flags: "i",
        message: "Dubious health claims",
      },
      {
        pattern: /this one weird trick|doctors hate this/.source,
        flags: "i",
        message: "Clickbait health language",
      },
    ],
  },

  spam: {
    patterns: [
      /click (?:the )?link/.source,
      /subscribe|like|comment|share/.source,
      /hit the notification bell/.source,
      /follow (?:me|us)/.source,
    ],
    threshold: 10,
    severity: "low",
    confidence: 0.8,
  },

  promotional: {
    indicators: [
      /buy|purchase|order|get yours|limited time|special offer/.source,
      /exclusive|only|today|now|don't miss|act now/.source,
      /save money|discount|sale|coupon|promo/.source,
      /free (shipping|delivery|trial|sample)/.source,
      /\$\d+|discount|% off|free offer/.source,
    ],
    saturation: 0.5,
    flagThreshold: 0.6,
    summaryThreshold: 0.4,
    allClearThreshold: 0.3,
    severity: "low",
    confidence: 0.85,
  },
};

/**
 * Default article quality thresholds.
 *
 * Weights: policy takes 0.1 and the content and SEO weights each give up
 * half of it (0.5 → 0.45, 0.3 → 0.25); structure stays at 0.2.
 */
export const DEFAULT_QUALITY_THRESHOLDS: QualityThresholds = {
  version: "1.0.0",
  structure: {
    minWordCount: 200,
    minSectionWordCount: 50,
    minHeadlineLength: 10,
    minIntroductionLength: 100,
    minConclusionLength: 100,
  },
  readabilityTarget: 60,
  recommendations: {
    readability: 50,
    coherence: 60,
    relevance: 70,
    uniqueness: 60,
    keywordOptimization: 70,
    metaTagQuality: 70,
    schemaMarkupQuality: 80,
    socialMediaOptimization: 80,
  },
  weights: {
    content: 0.45,
    seo: 0.25,
    structure: 0.2,
    policy: 0.1,
  },
  ratingBands: {
    excellent: 85,
    good: 70,
    fair: 50,
  },
  policy: {
    checks: {
      profanity: {
        patterns: [
          /\b(?:f[u*]ck|shit|ass(?:hole)?|damn|crap)\b/.source,
          /\b(?:bitch|bastard|arsehole)\b/.source,
        ],
        penaltyScore: 70,
      },
      violence: {
        patterns: [
          /\b(?:kill|murder|assault|attack|stabbing|shooting)\b/.source,
          /graphic(?:ally)? (?:violent|graphic)/.source,
        ],
        penaltyScore: 75,
      },
      harassment: {
        patterns: [
          /should (?:die|be killed|burn|hang)/.source,
          /\b(?:hate|loser|dumb|stupid)\s+(?:all\s+)?(?:people|them)/.source,
        ],
        penaltyScore: 70,
      },
      // No hate-speech patterns ship by default; reliable detection needs
      // more than keyword heuristics.
      hate_speech: {
        patterns: [],
        penaltyScore: 100,
      },
      misinformation: {
        patterns: [
          /miracle (?:cure|solution)/.source,
          /(?:guaranteed|proven) to cure/.source,
          /this one weird trick/.source,
        ],
        penaltyScore: 75,
      },
    },
    promotionalFlagScore: 80,
    sponsorFlagScore: 85,
    ratingBands: {
      compliant: 95,
      warning: 80,
      flagged: 50,
    },
  },
};
