import type { ProfileStoragePort } from '../../../application/ports/ProfileStoragePort.js';
import type { ProfileSettings, PurchasePlan } from '../../../domain/entities/PurchasePlan.js';

export class InMemoryProfileStorageAdapter implements ProfileStoragePort {
  private readonly profiles = new Map<string, ProfileSettings>();
  private readonly plans = new Map<string, PurchasePlan>();

  async saveProfile(userId: string, profile: ProfileSettings): Promise<void> {
    this.profiles.set(userId, profile);
  }

  async loadProfile(userId: string): Promise<ProfileSettings | null> {
    return this.profiles.get(userId) ?? null;
  }

  async savePurchasePlan(plan: PurchasePlan): Promise<void> {
    this.plans.set(plan.id, plan);
  }

  async listPurchasePlans(userId: string): Promise<PurchasePlan[]> {
    return Array.from(this.plans.values())
      .filter((plan) => plan.userId === userId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async deletePurchasePlan(userId: string, planId: string): Promise<boolean> {
    const plan = this.plans.get(planId);

    if (!plan || plan.userId !== userId) {
      return false;
    }

    return this.plans.delete(planId);
  }
}
