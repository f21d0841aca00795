import dotenv from 'dotenv';
import ChannelListing from '../modules/channel-listing';
import { ENV_FILE_PATH } from '../datas/constants';

dotenv.config({ path: ENV_FILE_PATH })

const argv = process.argv.slice(2)

if (argv.length !== 1) {
    console.error('usage: count-channel-videos <channel url | @handle | channel id>')
    process.exit(1)
}

const videos = new ChannelListing(argv[0], 'videos')
const shorts = new ChannelListing(argv[0], 'shorts')

console.log(`videos: ${await videos.count()} (${videos.status()})`)
console.log(`shorts: ${await shorts.count()} (${shorts.status()})`)
