import type { EngineConfig } from "./config";
import type { TierOverview, TieredDigest } from "./types";

type SummarizerConfig = Pick<EngineConfig, "tier0MaxChars" | "tier1MaxChars" | "tier1Labels">;

const MAX_KEY_POINTS = 5;
const MAX_SECTIONS = 4;
const KEY_POINTS_SHOWN = 3;
const PARAGRAPHS_SHOWN = 2;

const TITLE_MAX_CHARS = 50;
const CONTENT_MIN_CHARS = 20;

// Order matters only for readability; a line qualifies on the first match.
export const KEY_POINT_PATTERNS: readonly RegExp[] = [
  /^[-*•]\s+/,
  /^\d+\.\s*/,
  /\b(?:TODO|FIXME|IMPORTANT|NOTE)\b/i,
  /(?:决策|重要)/,
  /(?:完成|进行中|阻塞)/,
  /\b(?:done|in progress|blocked|decision)\b/i,
  /^#+\s+/
];

const HEADING_PATTERN = /^#{1,6}\s/;

function meaningfulLines(text: string): string[] {
  return text
    .trim()
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function generateTier0(text: string, config: Pick<SummarizerConfig, "tier0MaxChars">): string {
  if (text.trim().length === 0) {
    return "";
  }

  let title = "";
  let titleFromHeading = false;
  let content = "";

  for (const line of meaningfulLines(text)) {
    if (line.startsWith("# ") && !titleFromHeading) {
      title = line.slice(2).trim();
      titleFromHeading = true;
    } else if (!title && line.length < TITLE_MAX_CHARS) {
      title = line;
    }

    if (line.length > CONTENT_MIN_CHARS) {
      content = line.slice(0, 100);
      break;
    }
  }

  let summary: string;
  if (title && content) {
    summary = `${title} | ${content.slice(0, 50)}...`;
  } else if (title) {
    summary = `${title.slice(0, 80)}...`;
  } else if (content) {
    summary = `${content.slice(0, 80)}...`;
  } else {
    summary = text.length > 80 ? `${text.slice(0, 80)}...` : text;
  }

  return summary.slice(0, config.tier0MaxChars);
}

export function extractKeyPoints(text: string, maxPoints = MAX_KEY_POINTS): string[] {
  const keyPoints: string[] = [];

  for (const line of meaningfulLines(text)) {
    if (line.length < 10) {
      continue;
    }
    if (KEY_POINT_PATTERNS.some((pattern) => pattern.test(line))) {
      keyPoints.push(line);
      if (keyPoints.length >= maxPoints) {
        break;
      }
    }
  }

  return keyPoints;
}

export function extractSections(text: string, maxSections = MAX_SECTIONS): string[] {
  const sections: string[] = [];
  let current: string | null = null;

  const close = () => {
    if (current !== null) {
      sections.push(current.trimEnd());
      current = null;
    }
  };

  for (const line of meaningfulLines(text)) {
    if (HEADING_PATTERN.test(line)) {
      close();
      if (line.startsWith("## ")) {
        current = `${line.slice(3).trim()}: `;
      }
    } else if (current !== null && line.length > 10) {
      current += `${line.slice(0, 100)}... `;
    }
  }
  close();

  return sections.slice(0, maxSections);
}

function extractParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > CONTENT_MIN_CHARS);
}

export function generateTier1(text: string, config: SummarizerConfig): TierOverview {
  const keyPoints = extractKeyPoints(text);
  const sections = extractSections(text);
  const parts: string[] = [];

  if (keyPoints.length > 0) {
    parts.push(config.tier1Labels.keyPoints);
    keyPoints.slice(0, KEY_POINTS_SHOWN).forEach((point, index) => {
      parts.push(`  ${index + 1}. ${point.slice(0, 80)}`);
    });
  }

  if (sections.length > 0) {
    parts.push(config.tier1Labels.sections);
    for (const section of sections) {
      parts.push(`  • ${section.slice(0, 100)}`);
    }
  }

  if (parts.length === 0) {
    const paragraphs = extractParagraphs(text);
    if (paragraphs.length > 0) {
      parts.push(config.tier1Labels.paragraphs);
      for (const paragraph of paragraphs.slice(0, PARAGRAPHS_SHOWN)) {
        parts.push(`  • ${paragraph.slice(0, 150)}...`);
      }
    }
  }

  return {
    text: parts.join("\n").slice(0, config.tier1MaxChars),
    keyPoints,
    sections
  };
}

export function summarize(text: string, config: SummarizerConfig, key?: string): TieredDigest {
  const overview = generateTier1(text, config);

  return {
    ...(key ? { key } : {}),
    tier0: generateTier0(text, config),
    tier1: overview.text,
    keyPoints: overview.keyPoints,
    sections: overview.sections,
    full: text
  };
}
