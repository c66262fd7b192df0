#!/usr/bin/env node
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { DEFAULT_KNESSET_NUM, KNESSET_CONFIG } from './constants';
import { parseDate } from './reconciliation/term-filter';
import { KnessetService } from './service';
import type { RosterWindow } from './types';

const COMMANDS_WITH_QUERY = ['search', 'profile', 'committee', 'bill', 'bill-text'];

function numberOption(args: string[], flag: string, fallback: number): number {
  if (!args.includes(flag)) return fallback;
  return parseInt(args[args.indexOf(flag) + 1] ?? '', 10) || fallback;
}

function printUsage(): void {
  console.log('\n📖 Available commands:');
  console.log('  members              - MKs who served in the Knesset, by last name');
  console.log('  parties              - Seat count per faction');
  console.log('  search <name>        - Every MK matching a name');
  console.log('  profile <name>       - Best MK match, flagged when ambiguous');
  console.log('  committee <name>     - Committee roster');
  console.log('  bill <name>          - Bill metadata, initiators and documents');
  console.log('  bill-text <name>     - Bill text from its best document');
  console.log('\n🔧 Options:');
  console.log(`  --knesset N          - Knesset number (default: ${DEFAULT_KNESSET_NUM})`);
  console.log('  --as-of DATE         - Committee roster at an ISO date (default: now)');
  console.log('  --all-time           - Committee roster across the whole term');
  const maxChars = KNESSET_CONFIG.LIMITS.BILL_TEXT_MAX_CHARS;
  console.log(`  --max-chars N        - Bill text budget (default: ${maxChars})`);
  console.log('\n📋 Examples:');
  console.log('  npm run dev profile "בנימין נתניהו"');
  console.log('  npm run dev committee "ועדת הכספים" --all-time');
  console.log('  npm run dev bill-text "חוק הביטוח הלאומי" --max-chars 5000');
}

async function main() {
  // Parse command line arguments
  const args = process.argv.slice(2);
  const command = (args[0] || 'members').toLowerCase();
  const query = args[1] && !args[1].startsWith('--') ? args[1] : '';
  const knessetNum = numberOption(args, '--knesset', DEFAULT_KNESSET_NUM);
  const maxChars = numberOption(args, '--max-chars', KNESSET_CONFIG.LIMITS.BILL_TEXT_MAX_CHARS);

  let window: RosterWindow = new Date();
  if (args.includes('--all-time')) {
    window = 'all-time';
  } else if (args.includes('--as-of')) {
    const asOf = parseDate(args[args.indexOf('--as-of') + 1]);
    if (!asOf) {
      console.error('❌ --as-of expects an ISO date, e.g. 2024-01-31');
      process.exit(1);
    }
    window = asOf;
  }

  if (![...COMMANDS_WITH_QUERY, 'members', 'parties'].includes(command)) {
    console.error(`❌ Unknown command: ${command}`);
    printUsage();
    process.exit(1);
  }
  if (COMMANDS_WITH_QUERY.includes(command) && !query) {
    console.error(`❌ ${command} needs a name to look up`);
    printUsage();
    process.exit(1);
  }

  const service = new KnessetService();

  try {
    await service.initialize();
    console.log(`🚀 Running ${command} for Knesset ${knessetNum}...`);

    let result: unknown;
    let notFound = '';
    switch (command) {
      case 'members':
        result = await service.listMembers(knessetNum);
        break;
      case 'parties':
        result = await service.listParties(knessetNum);
        break;
      case 'search':
        result = await service.findByName(query, knessetNum);
        break;
      case 'profile':
        result = await service.getProfile(query, knessetNum);
        notFound = `No MK found matching '${query}'`;
        break;
      case 'committee':
        result = await service.committeeRosterByName(query, knessetNum, window);
        notFound = `No committee found matching '${query}'`;
        break;
      case 'bill':
        result = await service.findBill(query, knessetNum);
        notFound = `No bill found matching '${query}'`;
        break;
      case 'bill-text':
        result = await service.billTextByName(query, knessetNum, maxChars);
        notFound = `Could not retrieve text for bill '${query}'`;
        break;
    }

    if (result === null) {
      console.log(notFound);
      return;
    }

    // Ensure output directory exists
    const outputDir = join(process.cwd(), 'out');
    mkdirSync(outputDir, { recursive: true });
    const outputPath = join(outputDir, `${command}.json`);
    writeFileSync(outputPath, JSON.stringify(result, null, 2), 'utf-8');

    console.log(JSON.stringify(result, null, 2));
    console.log(`Results saved to ${outputPath}`);
  } catch (error) {
    console.error('Error:', error);
    process.exitCode = 1;
  } finally {
    await service.close();
  }
}

if (require.main === module) {
  main().catch(console.error);
}

export { MemberListCache } from './cache';
export * from './constants';
export { UpstreamRequestError } from './errors';
export * from './reconciliation';
export { KnessetService, type KnessetServiceOptions, truncateText } from './service';
export { KnessetODataClient } from './sources/knesset-odata';
export { OpenKnessetClient } from './sources/open-knesset';
export type * from './sources/types';
export { PdfTextExtractor, splitPages, type TextExtractor } from './text-extraction';
export * from './types';
