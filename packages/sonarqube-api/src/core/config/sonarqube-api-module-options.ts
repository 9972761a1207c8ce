import { z } from 'zod/v4';

export const sonarQubeApiModuleOptionsSchema = z.object({
  observability: z
    .object({
      loggerContext: z
        .string()
        .optional()
        .prefault('SonarQubeApi')
        .describe('The logger context which will be present in package logs'),
      metricPrefix: z
        .string()
        .optional()
        .prefault('sonarqube_api')
        .describe('The metrics prefix which will be present in all the metrics'),
    })
    .optional()
    .prefault({
      loggerContext: 'SonarQubeApi',
      metricPrefix: 'sonarqube_api',
    }),
});

export type ParsedSonarQubeApiModuleOptions = z.infer<typeof sonarQubeApiModuleOptionsSchema>;
