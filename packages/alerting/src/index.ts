export { AlertManager } from './AlertManager';
export type { AlertManagerConfig, AlertInput, AlertSample, AlertManagerDeps } from './AlertManager';
export { AlertHistory } from './history';
export {
  SlackChannel,
  EmailChannel,
  buildSlackPayload,
  formatEmail,
} from './channels';
export type { NotificationChannel, ChannelTier, EmailChannelConfig } from './channels';
export { HttpTransport, HttpError } from './transport';
export type { TransportConfig, TransportResponse } from './transport';
