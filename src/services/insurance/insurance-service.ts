import { logger } from '../logging';

export type InsuranceStatus = 'active' | 'inactive' | 'expired' | 'not_found' | 'error';

export interface CoverageDetails {
    planName?: string;
    coverageType?: string;
    memberId?: string;
    expiryDate?: string;
    deductible?: number;
    coPayPercentage?: number;
    reason?: string;
}

export interface InsuranceVerificationResult {
    status: InsuranceStatus;
    provider?: string;
    coverage: CoverageDetails;
    errorMessage?: string;
}

const PROVIDERS = ['Daman Health Insurance', 'Cigna Health Insurance', 'AXA Insurance', 'Neuron', 'Oman Insurance'];
const PLANS = ['Basic Plan', 'Enhanced Plan', 'Premium Plan', 'Gold Plan', 'Executive Plan'];
const COVERAGE_TYPES = ['Full Coverage', 'Basic Coverage', 'Partial Coverage'];

/**
 * Stand-in for an insurer lookup by Emirates ID. Outcomes are deterministic per ID
 * so the same patient always gets the same answer.
 */
export class InsuranceService {
    async verify(emiratesId: string): Promise<InsuranceVerificationResult> {
        logger.info('Verifying insurance', { emiratesIdSuffix: emiratesId.slice(-4) });

        if (emiratesId.length < 10) {
            return { status: 'error', coverage: {}, errorMessage: 'Invalid Emirates ID format' };
        }

        const hash = [...emiratesId].reduce((sum, ch) => sum + ch.charCodeAt(0), 0);
        const memberSuffix = emiratesId.slice(-6);

        switch (hash % 5) {
            case 0:
                return { status: 'not_found', coverage: {} };
            case 1:
                return {
                    status: 'expired',
                    provider: 'Daman Health Insurance',
                    coverage: {
                        planName: 'Enhanced Plan',
                        expiryDate: '2023-01-15',
                        memberId: `DH${memberSuffix}`,
                    },
                };
            case 2:
                return {
                    status: 'inactive',
                    provider: 'AXA Insurance',
                    coverage: {
                        planName: 'Premier Health',
                        memberId: `AX${memberSuffix}`,
                        reason: 'Payment pending',
                    },
                };
            default: {
                const provider = PROVIDERS[hash % PROVIDERS.length];
                return {
                    status: 'active',
                    provider,
                    coverage: {
                        planName: PLANS[hash % PLANS.length],
                        coverageType: COVERAGE_TYPES[hash % COVERAGE_TYPES.length],
                        memberId: `${provider.slice(0, 2).toUpperCase()}${memberSuffix}`,
                        deductible: (hash % 10) * 50,
                        coPayPercentage: (hash % 5) * 5,
                        expiryDate: `2027-${String((hash % 12) + 1).padStart(2, '0')}-${String((hash % 28) + 1).padStart(2, '0')}`,
                    },
                };
            }
        }
    }
}

export const insuranceService = new InsuranceService();
