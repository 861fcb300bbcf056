/**
 * API process entrypoint: HTTP server plus the daily job scheduler.
 */

import { loadConfig } from '../config.ts';
import { createPool } from '../db.ts';
import { createPostmarkMailer } from '../email/mailer.ts';
import { Scheduler } from '../worker/scheduler.ts';
import { sendBirthdayReminders } from './birthdays/service.ts';
import { sendDueReminderMail } from './reminders/mail-job.ts';
import { buildServer } from './server.ts';

const config = loadConfig();
const pool = createPool(config.database);
const mailer = createPostmarkMailer(config.mail);

const scheduler = new Scheduler({ timezone: 'UTC' });
scheduler.register({
  name: 'birthday-reminders',
  cron: config.scheduler.birthday_cron,
  run: () => sendBirthdayReminders({ pool, mailer, template: config.mail.birthday_template }),
});
scheduler.register({
  name: 'reminder-mail',
  cron: config.scheduler.reminder_cron,
  run: () => sendDueReminderMail({ pool, mailer, template: config.mail.reminder_template }),
});

const app = buildServer({ config, pool, scheduler, logger: true });

await app.listen({ port: config.port, host: config.host });

if (config.scheduler.enabled) {
  scheduler.start();
} else {
  app.log.warn('Scheduler disabled; jobs run only when triggered through /api/jobs');
}

if (!mailer.isConfigured()) {
  app.log.warn('Postmark is not configured; birthday and reminder mail will be skipped');
}

let shuttingDown = false;
const shutdown = async (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  app.log.info({ signal }, 'Shutting down');

  scheduler.stop();
  await app.close();
  await pool.end();
  process.exit(0);
};

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
