import dotenv from 'dotenv';
import { collectChannelReferences } from '../modules/channel-batch';
import { ENV_FILE_PATH } from '../datas/constants';

dotenv.config({ path: ENV_FILE_PATH })

const channels = process.argv.slice(2)

if (channels.length === 0) {
    console.error('usage: fetch-multiple-channels <channel> [channel...]')
    process.exit(1)
}

const results = await collectChannelReferences(channels, 'videos', { concurrency: 2 })

for (const result of results) {
    const detail = result.error ? `error: ${result.error}` : `${result.references.length} videos`
    console.log(`${result.url}, ${result.status}, ${detail}`)
}
console.log(`total result: ${results.reduce((sum, result) => sum + result.references.length, 0)}`)
