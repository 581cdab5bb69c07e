import type { Audience, Purpose, Style, Tone } from "@postcraft/core";

export const TONE_GUIDELINES: Record<Tone, string> = {
  Professional: "Maintain clear, formal business language.",
  Casual: "Use conversational language and personal anecdotes.",
  Humorous: "Include light jokes or witty observations.",
  Inspirational: "Focus on motivation and positive messaging.",
  Educational: "Provide valuable insights or practical tips.",
};

export const STYLE_GUIDELINES: Record<Style, string> = {
  Storytelling:
    "Structure as a narrative with beginning, middle, and end. Use personal anecdotes.",
  "List Format":
    "Present information in numbered points or bullet format for easy readability.",
  "Question-Answer":
    "Start with a compelling question and provide thoughtful answers.",
  "Tips & Tricks": "Focus on actionable advice and practical insights.",
  "Personal Reflection":
    "Share personal experiences, lessons learned, and honest insights.",
};

export const AUDIENCE_GUIDELINES: Record<Audience, string> = {
  Students:
    "Use relatable college/university experiences, learning journey, academic challenges.",
  Professionals:
    "Focus on career growth, workplace insights, professional development.",
  Entrepreneurs:
    "Emphasize business insights, startup journey, leadership lessons.",
  "Job Seekers":
    "Address job search challenges, interview tips, career transition advice.",
  General: "Keep content broadly relatable and universally valuable.",
};

export const PURPOSE_GUIDELINES: Record<Purpose, string> = {
  "Share Experience":
    "Be authentic and share genuine personal experiences with lessons learned.",
  "Give Advice": "Provide actionable tips and insights based on experience.",
  "Ask Question":
    "Engage audience with thought-provoking questions that encourage interaction.",
  "Celebrate Achievement":
    "Share accomplishments while remaining humble and inspiring others.",
  Educational:
    "Focus on teaching something valuable with clear, actionable information.",
};

const DEFAULT_AUDIENCE_GUIDELINE = "Keep content relevant and valuable for this audience.";

function isKnownAudience(audience: string): audience is Audience {
  return Object.prototype.hasOwnProperty.call(AUDIENCE_GUIDELINES, audience);
}

/** Free-text audiences get a generic line. */
export function audienceGuideline(audience: string): string {
  return isKnownAudience(audience)
    ? AUDIENCE_GUIDELINES[audience]
    : DEFAULT_AUDIENCE_GUIDELINE;
}
