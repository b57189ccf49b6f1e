import { z } from 'zod';
import { SOURCE_SYSTEMS, type SourceSystem } from './sources.js';

// ============================================================================
// Identity Mapping Types
// ============================================================================

const optionalLabel = z.string().trim().min(1).nullish();

export const mappingInputSchema = z.object({
    sourceSystem: z.enum(SOURCE_SYSTEMS),
    externalCampaignId: z.string().trim().min(1),
    originalCampaignName: z.string().trim().optional(),
    displayName: z.string().trim().min(1),
    category: optionalLabel,
    campaignType: optionalLabel,
    network: optionalLabel,
    displayNetworkLabel: optionalLabel,
    displaySourceLabel: optionalLabel,
    displayOrder: z.number().int().min(0).optional(),
});

export type MappingInput = z.infer<typeof mappingInputSchema>;

export const reorderItemsSchema = z
    .array(
        z.object({
            id: z.number().int().positive(),
            displayOrder: z.number().int().min(0),
        })
    )
    .refine(items => new Set(items.map(item => item.id)).size === items.length, { message: 'Duplicate mapping id in reorder request' });

export type ReorderItem = z.infer<typeof reorderItemsSchema>[number];

/**
 * Canonical identity for one (sourceSystem, externalCampaignId). Optional
 * columns read as null (labels) or 0 (displayOrder) on databases that do not
 * have them yet.
 */
export interface IdentityMapping {
    id: number;
    sourceSystem: SourceSystem;
    externalCampaignId: string;
    originalCampaignName: string;
    displayName: string;
    category: string | null;
    campaignType: string | null;
    network: string | null;
    displayNetworkLabel: string | null;
    displaySourceLabel: string | null;
    displayOrder: number;
    isActive: boolean;
    createdAt: Date;
    updatedAt: Date;
}

/** A fact identity with no active mapping. */
export interface UnmappedCampaign {
    sourceSystem: SourceSystem;
    externalCampaignId: string;
    campaignName: string;
    network: string | null;
}

export const mappingKey = (sourceSystem: SourceSystem, externalCampaignId: string) => `${sourceSystem}\u0000${externalCampaignId}`;
