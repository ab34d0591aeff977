import { z } from "zod";

export const campaignSubmissionSchema = z.object({
  id: z.string().optional(),
  brandName: z.string().optional(),
  brandWebsite: z.string().optional(),
  websiteContent: z.string().optional(),
  legalEntityName: z.string().optional(),
  vertical: z.string().optional(),
  useCase: z.string().optional(),
  campaignDescription: z.string().optional(),
  optInDescription: z.string().optional(),
  sampleMessages: z.array(z.string()).optional(),
  supportEmail: z.string().optional(),
  supportPhone: z.string().optional(),
  privacyUrl: z.string().optional(),
  termsUrl: z.string().optional(),
  urls: z.array(z.string()).optional(),
  streetAddress: z.string().optional(),
  companyEin: z.string().optional()
});

export const scrapedPageSchema = z.object({
  url: z.string(),
  title: z.string().optional(),
  textContent: z.string().default(""),
  sections: z.record(z.string()).default({}),
  privacyUrl: z.string().optional(),
  termsUrl: z.string().optional(),
  error: z.string().optional()
});

export const analyzeSubmissionSchema = campaignSubmissionSchema.extend({
  websiteData: scrapedPageSchema.optional(),
  policyPages: z
    .object({
      privacy: scrapedPageSchema.optional(),
      terms: scrapedPageSchema.optional()
    })
    .default({}),
  additionalUrls: z.array(z.string()).default([])
});

export type AnalyzeSubmissionInput = z.infer<typeof analyzeSubmissionSchema>;
