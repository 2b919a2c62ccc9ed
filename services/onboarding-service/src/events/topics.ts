export const topics = {
  onboardingRequested: "onboarding.requested",
  onboardingCompleted: "onboarding.completed",
  onboardingRolledBack: "onboarding.rolled_back"
} as const;
