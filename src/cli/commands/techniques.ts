/**
 * Techniques command — flatten the ATT&CK STIX bundle into the technique
 * master, the tactic order lookup and the dataset metadata.
 */

import type { Command } from 'commander';

import { buildTechniqueMasterFromFile } from '../../knowledge/mitre-attack/technique-master.js';
import {
  addRootOption,
  addVerboseOption,
  pathOption,
  printBanner,
  printInfo,
  printSuccess,
  requireInputFile,
  resolveCommandConfig,
  type RootOptions,
} from '../options.js';

interface TechniquesOptions extends RootOptions {
  src?: string;
  out?: string;
  tacticsOut?: string;
  metadataOut?: string;
}

export function registerTechniquesCommand(program: Command): void {
  const cmd = program
    .command('techniques')
    .description('Build the ATT&CK technique master from an enterprise-attack STIX bundle')
    .option('-s, --src <file>', 'STIX bundle (default: mappings/raw/enterprise-attack.json)')
    .option('-o, --out <file>', 'Technique master CSV')
    .option('--tactics-out <file>', 'Tactic order CSV')
    .option('--metadata-out <file>', 'Dataset metadata JSON');
  addRootOption(cmd);
  addVerboseOption(cmd);
  cmd.action((options: TechniquesOptions) => {
    runTechniques(options);
  });
}

function runTechniques(options: TechniquesOptions): void {
  printBanner('Use-Case Factory — ATT&CK Technique Master');

  const config = resolveCommandConfig(options);
  const bundlePath = requireInputFile(pathOption(options.src, config.paths.attackBundle), 'ATT&CK bundle');
  const outputs = {
    techniqueMaster: pathOption(options.out, config.paths.techniqueMaster),
    tacticOrder: pathOption(options.tacticsOut, config.paths.tacticOrder),
    attackMetadata: pathOption(options.metadataOut, config.paths.attackMetadata),
  };

  printInfo(`Source: ${bundlePath}`);
  console.log('');

  const master = buildTechniqueMasterFromFile(bundlePath, outputs);
  const { metadata } = master;

  printSuccess(
    `ATT&CK ${metadata.attackVersion}: ${metadata.techniqueCount} techniques ` +
      `(${metadata.subtechniqueCount} sub-techniques) across ${metadata.tacticCount} tactics`,
  );
  printInfo(`Wrote ${outputs.techniqueMaster}`);
  printInfo(`Wrote ${outputs.tacticOrder}`);
  printInfo(`Wrote ${outputs.attackMetadata}`);
  console.log('');
}
