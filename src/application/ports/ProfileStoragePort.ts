import type { ProfileSettings, PurchasePlan } from '../../domain/entities/PurchasePlan.js';

export interface ProfileStoragePort {
  saveProfile(userId: string, profile: ProfileSettings): Promise<void>;
  loadProfile(userId: string): Promise<ProfileSettings | null>;
  savePurchasePlan(plan: PurchasePlan): Promise<void>;
  listPurchasePlans(userId: string): Promise<PurchasePlan[]>;
  deletePurchasePlan(userId: string, planId: string): Promise<boolean>;
}
