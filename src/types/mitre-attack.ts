/**
 * MITRE ATT&CK types for the flattened technique master.
 */

export interface Technique {
  id: string;                    // e.g., "T1059.001"
  name: string;                  // e.g., "PowerShell"
  tactic: string;                // primary tactic short name, e.g., "execution"
  tactics: string[];             // every tactic short name, canonical order
  isSubtechnique: boolean;
  parentId?: string;             // e.g., "T1059" for T1059.001
  platforms: string[];           // e.g., ["Windows"]
}

export interface Tactic {
  id: string;                    // e.g., "TA0002"
  shortName: string;             // e.g., "execution"
  name: string;                  // e.g., "Execution"
  order: number;                 // 0-based position in the matrix
}

export interface AttackMetadata {
  attackVersion: string;
  objectCount: number;
  techniqueCount: number;
  subtechniqueCount: number;
  tacticCount: number;
  generatedAt: string;
}

export interface TechniqueMaster {
  techniques: Technique[];
  tactics: Tactic[];
  metadata: AttackMetadata;
}
