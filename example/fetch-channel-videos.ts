import dotenv from 'dotenv';
import ChannelListing from '../modules/channel-listing';
import { ENV_FILE_PATH } from '../datas/constants';

dotenv.config({ path: ENV_FILE_PATH })

const argv = process.argv.slice(2)

if (argv.length < 1 || argv.length > 2) {
    console.error('usage: fetch-channel-videos <channel url | @handle | channel id> [until video id]')
    process.exit(1)
}

const [channel, until] = argv
const listing = new ChannelListing(channel, 'videos')

for await (const url of listing.itemUrls(until)) {
    console.log(url)
}
console.log(`status: ${listing.status(until)}`)
