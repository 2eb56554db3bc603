#!/usr/bin/env node
import fs from 'fs'
import fsp from 'fs/promises'
import mkdir from 'make-dir'
import path from 'path'
import argv from './argv.js'
import detectWashSales from './detectWashSales.js'
import error from './error.js'
import log from './log.js'
import parseLedger from './parseLedger.js'
import {
  describeEntry,
  exitStatus,
  formatAmount,
  lotFields,
  lotRows,
  saleFields,
  saleRows,
  toCSV,
  violationFields,
  violationRows,
  washSaleFields,
  washSaleRows,
} from './report.js'
import validateLedger from './validateLedger.js'

/****************************************************************
 * RUN
 *****************************************************************/

const input = argv._[0].toString()

let text = ''
try {
  text = await fsp.readFile(input, 'utf-8')
} catch (e) {
  error(`Cannot read ${input}:`, e instanceof Error ? e.message : e)
}

const { entries, options, errors: parseErrors } = parseLedger(text)
const report = validateLedger(entries, { tolerance: argv.tolerance })
const violations = violationRows(parseErrors, report.results)

log(options.title ?? path.basename(input))
log('')

// entries
report.results.forEach(result => {
  if (result.ok) {
    log.verbose.ok(describeEntry(result.entry))
  } else {
    result.errors.forEach(err => log.error(`line ${err.line ?? result.entry.line}:`, err.message))
  }
})
parseErrors.forEach(err => log.error(err.message))

const count = (type: string) => entries.filter(entry => entry.type === type).length
log('')
log('Opens:', count('open'))
log('Closes:', count('close'))
log('Balances:', count('balance'))
log('Transactions:', count('transaction'))
log(violations.length === 0 ? `TOTAL: ${entries.length} ✓` : `✗ VIOLATIONS: ${violations.length}`)
log('')

// open lots
if (argv.lots) {
  log('LOTS')
  report.lots.forEach(lot => {
    log(`  ${lot.date} ${lot.account} ${lot.amount} ${lot.cur} {${lot.cost.number} ${lot.cost.currency}}`)
  })
  log('')
}

// wash sales
const washSales = argv.washsales || argv.output ? detectWashSales(report, { windowDays: argv.window }) : []
if (argv.washsales) {
  log('WASH SALES')
  if (report.sales.length === 0) {
    log.warn('No sales with a price annotation (@). Losses cannot be computed without proceeds.')
  } else if (washSales.length === 0) {
    log('  None')
  }
  washSales.forEach(({ sale, loss, disallowedLoss, allowedLoss, adjustedLots }) => {
    log(`  ${sale.date} sold ${sale.amount} ${sale.cur}, loss`, formatAmount(-loss, sale.currency))
    log('    Disallowed:', formatAmount(disallowedLoss, sale.currency))
    log('    Allowed:', formatAmount(allowedLoss, sale.currency))
    adjustedLots
      .filter(lot => lot.adjustment !== 0)
      .forEach(lot => {
        log(`    ${lot.date} ${lot.amount} ${lot.cur} basis`, formatAmount(lot.basis, lot.cost.currency))
      })
  })
  log('')
}

// output csv
if (argv.output) {
  const dir = await mkdir(argv.output)
  fs.writeFileSync(path.join(dir, 'violations.csv'), toCSV(violations, violationFields))
  fs.writeFileSync(path.join(dir, 'lots.csv'), toCSV(lotRows(report.lots), lotFields))
  fs.writeFileSync(path.join(dir, 'sales.csv'), toCSV(saleRows(report.sales), saleFields))
  fs.writeFileSync(path.join(dir, 'wash-sales.csv'), toCSV(washSaleRows(washSales), washSaleFields))
  log.verbose(`Reports written to ${dir}`)
}

process.exitCode = exitStatus(violations)
