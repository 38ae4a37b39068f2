import { EventBus } from './EventBus';
import { LOG_CONFIG } from '@/config';

export type LogClass = 'normal' | 'action' | 'combat' | 'skill' | 'quest' | 'invalid' | 'system';

export const Logger = {
  log(text: string, type: LogClass = 'normal'): void {
    if (LOG_CONFIG.console) console.log(`[${type.toUpperCase()}] ${text}`);
    EventBus.emit('logMessage', { text, cls: type });
  },
};
