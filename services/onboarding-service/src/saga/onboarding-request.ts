import { z } from "zod";

export const onboardingRequestSchema = z
  .object({
    tenant: z.object({
      tenantId: z
        .string()
        .trim()
        .min(1)
        .max(128)
        .regex(/^[a-zA-Z0-9][a-zA-Z0-9_-]*$/, "tenantId may only contain letters, digits, '-' and '_'"),
      displayName: z.string().trim().min(1),
      domain: z.string().trim().min(3),
      adminEmail: z.string().email(),
      protocol: z.enum(["saml", "oidc"]).default("saml")
    }),
    provisioning: z.object({
      region: z.string().min(1),
      plan: z.enum(["standard", "premium", "enterprise"]),
      seats: z.number().int().positive().optional()
    }),
    dr: z.object({
      targetRegion: z.string().min(1),
      rpoMinutes: z.number().int().positive(),
      rtoMinutes: z.number().int().positive()
    })
  })
  .refine((request) => request.dr.targetRegion !== request.provisioning.region, {
    message: "DR target region must differ from the primary region",
    path: ["dr", "targetRegion"]
  });

export type OnboardingRequest = z.infer<typeof onboardingRequestSchema>;
export type OnboardingRequestInput = z.input<typeof onboardingRequestSchema>;

export function parseOnboardingRequest(input: unknown): OnboardingRequest {
  return onboardingRequestSchema.parse(input);
}
