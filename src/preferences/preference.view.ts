import { channelName, listChannels } from '../notifications/notification-channel';
import { PriorityName, priorityName } from '../notifications/notification.enums';
import { NotificationPreference } from './entities/notification-preference.entity';

export interface PreferenceView {
  id: string | null;
  userId: string;
  tenantId: string | null;
  category: string | null;
  enabledChannels: string[];
  isEnabled: boolean;
  minimumPriority: PriorityName;
  email: string | null;
  phone: string | null;
  webhookUrl: string | null;
  pushEndpoint: string | null;
  updatedAt: string | null;
}

/** Push keys stay server-side; the endpoint alone tells clients a subscription exists. */
export function toPreferenceView(preference: NotificationPreference): PreferenceView {
  return {
    // unsaved defaults have no id or timestamps yet
    id: preference.id ?? null,
    userId: preference.userId,
    tenantId: preference.tenantId,
    category: preference.category,
    enabledChannels: listChannels(preference.enabledChannels).map(channelName),
    isEnabled: preference.isEnabled,
    minimumPriority: priorityName(preference.minimumPriority),
    email: preference.email,
    phone: preference.phone,
    webhookUrl: preference.webhookUrl,
    pushEndpoint: preference.pushEndpoint,
    updatedAt: preference.updatedAt instanceof Date ? preference.updatedAt.toISOString() : null,
  };
}
