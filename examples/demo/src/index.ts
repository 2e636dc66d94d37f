/**
 * Deliberate - Demo Terminal App
 *
 * Runs the plugin's entry points from a text menu. Pass --all to run every
 * scenario once and exit.
 */

import 'dotenv/config'
import * as readline from 'readline'
import { createPluginFunctions, sharedAgent, type UserContext } from '../../../src/index.js'
import { scenarios } from './scenarios.js'

const functions = createPluginFunctions(sharedAgent)

const user: UserContext = {
  id: process.env.DEMO_USER_ID || 'demo-user',
  name: process.env.DEMO_USER_NAME || 'Demo User'
}

function printMenu(): void {
  console.log('\n' + '='.repeat(60))
  console.log('  Deliberate - Heuristic Thinking Agent')
  console.log('='.repeat(60))
  for (const scenario of scenarios) {
    console.log(`  ${scenario.key}. ${scenario.title}`)
  }
  console.log('  t. Think about your own question')
  console.log('\nCommands: "quit" to exit')
}

function runAll(): void {
  for (const scenario of scenarios) {
    console.log(`\n--- ${scenario.title} ---\n`)
    console.log(scenario.run(functions, user))
  }
}

function main(): void {
  if (process.argv.includes('--all')) {
    runAll()
    return
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  })

  printMenu()

  const prompt = () => {
    rl.question('\nChoice: ', (input) => {
      const trimmed = input.trim()

      if (trimmed.toLowerCase() === 'quit') {
        console.log('\nGoodbye!\n')
        rl.close()
        return
      }

      if (trimmed.toLowerCase() === 't') {
        rl.question('Question: ', (query) => {
          console.log('\n' + functions.enhancedThinking(query, { user }))
          prompt()
        })
        return
      }

      const scenario = scenarios.find(s => s.key === trimmed)
      if (scenario) {
        console.log('\n' + scenario.run(functions, user))
      } else if (trimmed) {
        console.log(`Unknown choice: ${trimmed}`)
        printMenu()
      }

      prompt()
    })
  }

  prompt()
}

main()
