import type { Command } from 'commander';
import { requireWorkspace, secretProviderFor } from '../cli-shared.js';

function printVaultStatus(status: { provider: string; healthy: boolean; message?: string }): void {
  console.log(`\nVault Provider: ${status.provider}`);
  console.log(`Status: ${status.healthy ? 'healthy' : 'unhealthy'}`);
  if (status.message) console.log(`Message: ${status.message}`);
}

export function registerVaultCommand(program: Command): void {
  const vault = program
    .command('vault')
    .description('Manage pipeline credentials (field names only; never shows values)');

  vault
    .command('status')
    .description('Show secret provider status and stored secret paths')
    .action(async () => {
      const provider = secretProviderFor(requireWorkspace());
      const status = await provider.status();
      const secrets = await provider.listSecrets();

      printVaultStatus(status);
      console.log(`\nSecrets (${secrets.length}):`);
      if (secrets.length === 0) {
        console.log('  (none)');
      } else {
        for (const s of secrets) {
          const modified = s.lastModified ? ` (modified: ${s.lastModified})` : '';
          console.log(`  - ${s.path} [${s.fields.join(', ')}]${modified}`);
        }
      }
      console.log('\nNote: Secret values are never displayed.');
    });

  vault
    .command('set <path> <field> <value>')
    .description('Store one field of a secret, e.g. `vault set secret/ci/git token <token>`')
    .action(async (path: string, field: string, value: string) => {
      const provider = secretProviderFor(requireWorkspace());
      await provider.setSecretField(path, field, value);
      console.log(`Secret stored: ${path} (${field})`);
      console.log('(Value not echoed for security)');
    });

  vault
    .command('delete <path>')
    .description('Delete a secret and all of its fields')
    .action(async (path: string) => {
      const provider = secretProviderFor(requireWorkspace());
      await provider.deleteSecret(path);
      console.log(`Secret deleted: ${path}`);
    });
}
