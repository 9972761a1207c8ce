import { Redacted } from '@sonar-admin/utils';
import { Dispatcher } from 'undici';
import { z } from 'zod/v4';

const DEFAULT_TIMEOUT_MS = 30_000;

export const sonarQubeApiClientOptionsSchema = z.object({
  baseUrl: z
    .url()
    .describe(
      'Base URL of the SonarQube server (e.g. https://sonar.example.com). ' +
        'Request paths are appended to it verbatim.',
    ),
  token: z
    .string()
    .min(1, 'Authentication token must not be empty')
    .transform((token) => new Redacted(token))
    .describe('User token sent as the basic auth username with an empty password'),
  verifySsl: z
    .boolean()
    .prefault(true)
    .describe('Whether to verify the TLS certificate of the SonarQube server'),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .prefault(DEFAULT_TIMEOUT_MS)
    .describe('Headers and body timeout applied to every request'),
  dispatcher: z
    .instanceof(Dispatcher)
    .optional()
    .describe(
      `Custom provided dispatcher in case you need to change the default implementation of the dispatcher`,
    ),
  metadata: z
    .object({
      clientName: z.string().optional(),
    })
    .prefault({}),
});

export type SonarQubeApiClientOptions = z.infer<typeof sonarQubeApiClientOptionsSchema>;

export type SonarQubeApiClientInputOptions = z.input<typeof sonarQubeApiClientOptionsSchema>;
