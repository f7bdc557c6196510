/**
 * Notification: desktop notification through the platform's own facility
 */

import { truncate } from '@hook-gate/common';
import { silent } from './output.js';
import type { HookHandler } from './types.js';

export const DEFAULT_TITLE = 'Assistant';
export const DEFAULT_MESSAGE = 'Needs your attention';

export interface NotifierCommand {
  command: string;
  args: string[];
}

function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function powerShellString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * The command that shows a notification on this platform, if there is one
 */
export function notifierCommand(
  platform: NodeJS.Platform,
  title: string,
  message: string
): NotifierCommand | undefined {
  switch (platform) {
    case 'darwin':
      return {
        command: 'osascript',
        args: ['-e', `display notification ${appleScriptString(message)} with title ${appleScriptString(title)}`],
      };
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return { command: 'notify-send', args: [title, message] };
    case 'win32':
      return {
        command: 'powershell',
        args: [
          '-NoProfile',
          '-Command',
          [
            'Add-Type -AssemblyName System.Windows.Forms',
            '$n = New-Object System.Windows.Forms.NotifyIcon',
            '$n.Icon = [System.Drawing.SystemIcons]::Information',
            '$n.Visible = $true',
            `$n.ShowBalloonTip(5000, ${powerShellString(title)}, ${powerShellString(message)}, 'Info')`,
          ].join('; '),
        ],
      };
    default:
      return undefined;
  }
}

export const notifyHook: HookHandler = async (input, { gate, log, runner, platform }) => {
  if (input.hook_event_name !== 'Notification') {
    log.info(`Skipped ${input.hook_event_name}`);
    return silent();
  }

  const title = input.title || DEFAULT_TITLE;
  const message = truncate(input.message || DEFAULT_MESSAGE, 240);
  const notifier = notifierCommand(platform, title, message);

  if (!notifier) {
    log.warn(`No notifier for platform ${platform}: ${message}`);
    return silent();
  }

  const result = await runner(notifier.command, notifier.args, {
    timeoutMs: gate.config.notifyTimeoutMs,
  });

  if (!result.ok) {
    const reason = result.error?.message ?? `${notifier.command} failed`;
    log.warn(`${reason}: ${message}`);
    return { messages: [`[notify] ${reason}`] };
  }

  log.info(message);
  return silent();
};
