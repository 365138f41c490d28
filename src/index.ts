#!/usr/bin/env node

import 'dotenv/config'
import { Command } from 'commander'
import {
  startCommand,
  checkConfigCommand,
  profileCommand,
  historyCommand,
  recallCommand
} from './cli/commands.js'

const program = new Command()

program
  .name('butler')
  .description('A Telegram butler that remembers its owners and refines its picture of each one')
  .version('1.0.0')
  .action(async () => {
    await startCommand({})
  })

program
  .command('start')
  .description('Run the bot (webhook mode when WEBHOOK_URL is set, long polling otherwise)')
  .option('--polling', 'Force long polling even when a webhook URL is configured')
  .action(async (options: { polling?: boolean }) => {
    await startCommand(options)
  })

program
  .command('check-config')
  .description('Validate configuration and show the resolved settings')
  .action(async () => {
    await checkConfigCommand()
  })

program
  .command('profile <userId>')
  .description('Show the personality summary kept for a user')
  .action(async (userId: string) => {
    await profileCommand(userId)
  })

program
  .command('history <userId>')
  .description('Show recent exchanges with a user')
  .option('--limit <n>', 'Number of exchanges to show', '10')
  .action(async (userId: string, options: { limit?: string }) => {
    await historyCommand(userId, options)
  })

program
  .command('recall <userId> <query>')
  .description('Search a user\'s long-term memories')
  .action(async (userId: string, query: string) => {
    await recallCommand(userId, query)
  })

program.parseAsync(process.argv).catch((err) => {
  console.error(err)
  process.exit(1)
})
