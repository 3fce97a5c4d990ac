#!/usr/bin/env node
/**
 * Markup printer CLI
 * Prints the canonical source of a JSON syntax tree
 *
 * Usage: markup-print <tree.ast.json> [options]
 */

import * as fs from 'fs'
import * as path from 'path'
import { parse } from './parser.js'
import { pretty } from './printer.js'

// Parse command-line arguments
const args = process.argv.slice(2)

function printHelp() {
  console.log('Usage: markup-print <tree.ast.json> [options]')
  console.log('')
  console.log('Arguments:')
  console.log('  <tree.ast.json>      Path to a JSON syntax tree')
  console.log('')
  console.log('Options:')
  console.log('  --output, -o <file>  Write the printed source to the specified file')
  console.log('  --check, -c <file>   Check that <file> is the canonical source (exit 1 if not)')
  console.log('  --quiet, -q          Suppress output except errors')
  console.log('  --help, -h           Show this help message')
  console.log('')
  console.log('Examples:')
  console.log('  markup-print doc.ast.json                # Preview printed source')
  console.log('  markup-print doc.ast.json -o doc.txt     # Print and save to a file')
  console.log('  markup-print doc.ast.json -c doc.txt     # Check a file against the tree')
}

if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
  printHelp()
  process.exit(args.includes('--help') || args.includes('-h') ? 0 : 1)
}

const quiet = args.includes('--quiet') || args.includes('-q')

function optionValue(long: string, short: string): string | undefined {
  const idx = args.findIndex(arg => arg === long || arg === short)
  return idx !== -1 ? args[idx + 1] : undefined
}

const outputFile = optionValue('--output', '-o')
const checkFile = optionValue('--check', '-c')

// Find input file (first arg that's not an option or option value)
const valueOptions = new Set(['--output', '-o', '--check', '-c'])
let inputFile: string | undefined
for (let i = 0; i < args.length; i++) {
  const arg = args[i]
  if (valueOptions.has(arg)) {
    i++ // skip the option value
    continue
  }
  if (!arg.startsWith('-')) {
    inputFile = arg
    break
  }
}

if (!inputFile) {
  console.error('Error: No input file specified')
  console.error('Run with --help for usage information')
  process.exit(1)
}

const sourceFile = path.resolve(inputFile)

if (!fs.existsSync(sourceFile)) {
  console.error(`Error: File not found: ${sourceFile}`)
  process.exit(1)
}

if (!sourceFile.endsWith('.json') && !quiet) {
  console.warn(`Warning: File does not have a .json extension: ${sourceFile}`)
}

const treeJson = fs.readFileSync(sourceFile, 'utf8')

if (!quiet) {
  console.log('Input:', path.relative(process.cwd(), sourceFile))
  console.log('Size:', treeJson.length, 'bytes')
}

function run() {
  try {
    const { rootNode, exprCount } = parse(treeJson)
    if (!quiet) {
      console.log('Expressions:', exprCount)
    }

    const printed = pretty(rootNode.tree)

    // Check mode - compare against an existing source file
    if (checkFile) {
      const existing = fs.readFileSync(path.resolve(checkFile), 'utf8')
      if (existing === printed) {
        if (!quiet) {
          console.log('✓ File is in canonical form')
        }
        process.exit(0)
      }
      if (!quiet) {
        console.log('✗ File is not in canonical form')
      }
      process.exit(1)
    }

    if (outputFile) {
      const targetFile = path.resolve(outputFile)
      fs.writeFileSync(targetFile, printed, 'utf8')
      if (!quiet) {
        console.log('Output:', path.relative(process.cwd(), targetFile))
        console.log('Size:', printed.length, 'bytes,', printed.split('\n').length, 'lines')
      }
      process.exit(0)
    }

    // Default - print to stdout
    if (quiet) {
      process.stdout.write(printed)
    } else {
      console.log('')
      console.log('--- Printed Source ---')
      console.log('')
      process.stdout.write(printed + '\n')
    }

  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error))
    if (!quiet && error instanceof Error && error.stack) {
      console.error('')
      console.error(error.stack)
    }
    process.exit(1)
  }
}

run()
