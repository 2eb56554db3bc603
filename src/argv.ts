import yargs from 'yargs'
import { defaultWindowDays } from './detectWashSales.js'
import { defaultTolerance } from './validateTransaction.js'

const argv = await yargs(process.argv.slice(2))
  .usage('Usage: $0 <ledger> [options]')
  .demandCommand(1)
  .option('tolerance', {
    default: defaultTolerance,
    describe: 'Largest residual allowed when checking that a transaction balances.',
    type: 'number',
  })
  .option('washsales', { default: false, describe: 'Print losses disallowed by the wash-sale rule.', type: 'boolean' })
  .option('window', {
    default: defaultWindowDays,
    describe: 'Days before and after a loss sale in which a purchase is a replacement.',
    type: 'number',
  })
  .option('lots', { default: false, describe: 'Print the lots still open after the last entry.', type: 'boolean' })
  .option('output', { describe: 'Output directory for CSV reports.', type: 'string' })
  .option('verbose', { default: false, describe: 'Print every entry as it is checked.', type: 'boolean' }).argv

export default argv
