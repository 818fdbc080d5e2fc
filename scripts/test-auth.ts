#!/usr/bin/env tsx

/**
 * Check that an API key is well-formed and accepted by the control plane.
 *
 * Usage:
 *   npm run test-auth -- [--api-key mk_xxx] [--base-url https://api.example.com]
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { ClientConfigLoader } from '../lib/api-config';
import { AuthChecker, AuthCheckResult } from '../lib/auth-check';
import { ControlPlaneClient } from '../lib/control-plane-client';

function printResults(apiKey: string, baseUrl: string, result: AuthCheckResult): void {
  const checks = ClientConfigLoader.validateApiKeyFormat(apiKey);
  const allValid = Object.values(checks).every(Boolean);

  console.log('\n' + '='.repeat(60));
  console.log('🔐 API AUTHENTICATION TEST');
  console.log('='.repeat(60));
  console.log(`\n📌 API Key: ${ClientConfigLoader.maskApiKey(apiKey)}`);
  console.log(`🌐 API URL: ${baseUrl}`);

  console.log('\n📋 API Key Format Validation:');
  console.log(`   ${checks.hasPrefix ? '✅' : '❌'} Has Prefix`);
  console.log(`   ${checks.minLength ? '✅' : '❌'} Min Length`);
  console.log(`   ${checks.noSpaces ? '✅' : '❌'} No Spaces`);
  console.log(`   ${checks.noQuotes ? '✅' : '❌'} No Quotes`);
  if (!allValid) {
    console.log("\n⚠️  Warning: API key format appears incorrect! Keys should start with 'mk_'");
  }

  console.log('\n📡 API Call Results:');
  if (result.success) {
    console.log('   ✅ Authentication successful!');
    if (result.endpoint) console.log(`   📍 Endpoint: ${result.endpoint}`);
    console.log(`   📊 Status Code: ${result.statusCode ?? 'N/A'}`);
    if (result.data !== undefined) {
      console.log('\n📦 Response Data:');
      JSON.stringify(result.data, null, 2)
        .split('\n')
        .forEach((line) => console.log(`   ${line}`));
    }
    if (result.note) console.log(`\n💡 Note: ${result.note}`);
  } else {
    console.log('   ❌ Authentication failed!');
    if (result.statusCode === 401) {
      console.log('\n   🔒 Error: Unauthorized (401). The API key is invalid or has been revoked.');
    } else if (result.statusCode === 403) {
      console.log("\n   🚫 Error: Forbidden (403). The API key doesn't have permission for this operation.");
    } else if (result.statusCode === 404) {
      console.log("\n   🔍 Error: Not Found (404). The /whoami endpoint doesn't exist.");
      result.testedEndpoints?.forEach((tested) => {
        console.log(`      • ${tested.endpoint}: 🔒 Requires auth (${tested.statusCode})`);
      });
    } else if (result.statusCode !== undefined) {
      console.log(`\n   ⚠️  Unexpected status code: ${result.statusCode}`);
    }
    if (result.error) console.log(`\n   🐛 Error Details: ${result.error}`);
    if (result.response) console.log(`\n   📄 Response Body:\n      ${result.response}`);
  }

  console.log('\n' + '='.repeat(60));
  if (result.success && allValid) {
    console.log('✅ SUCCESS: Your API key is valid and working correctly!');
  } else if (result.success) {
    console.log('⚠️  PARTIAL SUCCESS: API key works but format is non-standard');
  } else {
    console.log('❌ FAILED: Unable to authenticate with the provided API key');
  }
  console.log('='.repeat(60) + '\n');
}

async function main() {
  const { values } = parseArgs({
    options: {
      'api-key': { type: 'string' },
      'base-url': { type: 'string' },
    },
  });

  const config = ClientConfigLoader.loadConfig();
  const apiKey = values['api-key'] || config.apiKey;
  if (!apiKey) {
    console.error('❌ Error: API key is required (--api-key or MOSAIC_API_KEY)');
    process.exit(1);
  }

  const baseUrl = values['base-url'] || config.baseUrl;
  const checker = new AuthChecker(new ControlPlaneClient({ baseUrl, apiKey }));

  console.log('\n🔄 Testing API authentication...');
  const result = await checker.checkWhoami();
  printResults(apiKey, baseUrl, result);
  process.exit(result.success ? 0 : 1);
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}

export { main as testAuthCli };
