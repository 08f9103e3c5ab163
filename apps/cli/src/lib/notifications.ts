/**
 * Terminal Notifications
 * 
 * Shows upload results as single output lines.
 */

import type { NotificationSink } from '@cache-mirror/sync';
import { printError, printSuccess } from './output.js';

export class TerminalNotificationSink implements NotificationSink {
  showMessage(title: string, message: string, repoId: string): void {
    const line = `${title} [${repoId}] ${message.replace(/\n/g, ' ')}`;
    if (title === 'Upload Failure') {
      printError(line);
    } else {
      printSuccess(line);
    }
  }
}
