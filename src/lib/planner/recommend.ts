import { RISK_TIERS, type PlannerConfig, type RiskTier, type TouchStatus } from "./schema";
import type { CadenceGuidance } from "./types";

export const UNKNOWN_CHANNEL = "unknown";

const CHANNEL_ALIASES: Record<string, string> = {
  sms: "sms",
  text: "sms",
  call: "call",
  phone: "call",
};

export function normalizeChannel(channel: string): string {
  const value = channel.trim().toLowerCase();
  if (!value) return UNKNOWN_CHANNEL;
  return CHANNEL_ALIASES[value] ?? value;
}

const CHANNEL_PHRASES: Record<string, string> = {
  sms: "Send a brief text check-in",
  email: "Send a focused email check-in",
  call: "Schedule a short call",
};

const URGENCY_PHRASES: Record<TouchStatus, string> = {
  overdue: "within 48 hours",
  "due-soon": "within the next week",
  "no-touch": "today",
  "on-track": "during the next touch window",
};

const TIER_PHRASES: Record<RiskTier, string> = {
  high: "Confirm support needs and capture blockers",
  medium: "Reconfirm goals and offer resource links",
  low: "Share a light encouragement and next milestone",
};

export function buildRecommendation(tier: RiskTier, channel: string, status: TouchStatus): string {
  const channelPhrase = CHANNEL_PHRASES[normalizeChannel(channel)] ?? "Send a check-in";
  return `${channelPhrase} ${URGENCY_PHRASES[status]}. ${TIER_PHRASES[tier]}.`;
}

const TIER_LABELS: Record<RiskTier, string> = {
  high: "High risk",
  medium: "Medium risk",
  low: "Low risk",
};

export function tierLabel(tier: RiskTier): string {
  return TIER_LABELS[tier];
}

export function buildCadenceGuidance(config: PlannerConfig): CadenceGuidance[] {
  return RISK_TIERS.map((tier) => ({
    tier,
    cadence_days: config.cadence_days[tier],
    text: `${TIER_LABELS[tier]}: touch every ${config.cadence_days[tier]} days`,
  }));
}
