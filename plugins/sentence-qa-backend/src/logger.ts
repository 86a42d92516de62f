/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

import winston, { Logger } from 'winston';

export interface LoggerOptions {
  level?: string;
  format?: 'json' | 'pretty';
  silent?: boolean;
}

/**
 * Root winston logger for the service
 */
export function createRootLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const formatName = options.format ?? (process.env.LOG_FORMAT === 'json' ? 'json' : 'pretty');

  const format =
    formatName === 'json'
      ? winston.format.combine(
          winston.format.timestamp(),
          winston.format.errors({ stack: true }),
          winston.format.json()
        )
      : winston.format.combine(
          winston.format.timestamp(),
          winston.format.errors({ stack: true }),
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level: lvl, message, service }) => {
            const prefix = service ? ` ${String(service)}` : '';
            return `${String(timestamp)} ${lvl}${prefix} ${String(message)}`;
          })
        );

  return winston.createLogger({
    level,
    format,
    defaultMeta: { service: 'sentence-qa' },
    transports: [new winston.transports.Console({ silent: options.silent ?? false })],
  });
}
