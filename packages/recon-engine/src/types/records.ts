/**
 * Normalized feed records.
 *
 * Built once by the feed validator and frozen; every later stage refers to
 * them by id.
 */

export type TaxTreatment = 'gross' | 'net' | 'exempt';

export const TAX_TREATMENTS: readonly TaxTreatment[] = ['gross', 'net', 'exempt'];

export interface Order {
  readonly orderId: string;
  readonly providerId: string;
  /** Confirmation code as received */
  readonly rawConfirmationCode: string;
  /** Canonical confirmation code used for matching */
  readonly confirmationCode: string;
  /** Expected commission converted to the provider's billing basis */
  readonly expectedCommission: number;
  /** Expected commission as received, before tax adjustment */
  readonly reportedCommission: number;
  readonly currency: string;
  readonly bookingDate: Date;
  readonly taxTreatment: TaxTreatment;
  /** Zero-based position in the orders feed */
  readonly recordIndex: number;
}

export interface CommissionLine {
  /** Unique within a provider file */
  readonly lineId: string;
  readonly providerId: string;
  readonly rawConfirmationCode: string;
  readonly confirmationCode: string;
  readonly billedAmount: number;
  readonly currency: string;
  /** YYYY-MM */
  readonly statementPeriod: string;
  /** Input lines folded into this one by de-duplication (just [lineId] otherwise) */
  readonly sourceLineIds: readonly string[];
  readonly recordIndex: number;
}
