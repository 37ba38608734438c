/**
 * @file Per-user notification settings.
 */

export const DEVICE_PLATFORMS = ['ios', 'android'] as const;
export type DevicePlatform = (typeof DEVICE_PLATFORMS)[number];

export const DEFAULT_QUIET_HOURS_START = 22;
export const DEFAULT_QUIET_HOURS_END = 8;

export interface UserSettings {
  userId: string;
  /** IANA zone; inferred from the vault location when absent */
  timezone: string | null;
  /** Local hour 0-23. Equal start and end disable quiet hours. */
  quietHoursStart: number;
  quietHoursEnd: number;
  notificationsEnabled: boolean;
  /** Single device per user */
  deviceToken: string | null;
  devicePlatform: DevicePlatform | null;
  createdAt: string;
  updatedAt: string;
}

export function defaultUserSettings(userId: string, now: Date = new Date()): UserSettings {
  const timestamp = now.toISOString();
  return {
    userId,
    timezone: null,
    quietHoursStart: DEFAULT_QUIET_HOURS_START,
    quietHoursEnd: DEFAULT_QUIET_HOURS_END,
    notificationsEnabled: true,
    deviceToken: null,
    devicePlatform: null,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}
