/**
 * @file Push payload text.
 */

import type { VibeTag } from '../../models/vault';
import type { PushPayload } from './models';

export function vibeLabel(vibe: VibeTag): string {
  return vibe
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function buildPayload(input: {
  notificationId: string;
  milestoneId: string;
  partnerName: string;
  milestoneName: string;
  daysBefore: number;
  recommendationIds: string[];
  vibe: VibeTag | undefined;
}): PushPayload {
  const count = input.recommendationIds.length;
  const body =
    count > 0
      ? `I've found ${count} ${input.vibe ? `${vibeLabel(input.vibe)} ` : ''}options based on their interests. Tap to see them.`
      : 'Tap to start planning.';

  return {
    title: `${input.partnerName}'s ${input.milestoneName} is in ${input.daysBefore} days`,
    body,
    category: 'MILESTONE_REMINDER',
    data: {
      notificationId: input.notificationId,
      milestoneId: input.milestoneId,
      recommendationIds: input.recommendationIds,
    },
  };
}
