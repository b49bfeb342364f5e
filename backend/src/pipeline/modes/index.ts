import type { IModeStrategy } from '../../interfaces';
import type { DetectionMode } from '../../types';
import { DibasicMode } from './dibasic';
import { FourResidueMotifMode } from './fourResidueMotif';
import { UltraPermissiveMode } from './ultraPermissive';

export const MODE_STRATEGIES: Record<DetectionMode, IModeStrategy> = {
    'strict': new DibasicMode(true),
    'permissive': new DibasicMode(false),
    'ultra-permissive': new UltraPermissiveMode(),
    'four-residue-motif': new FourResidueMotifMode()
};
