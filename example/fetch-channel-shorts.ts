import dotenv from 'dotenv';
import ChannelListing from '../modules/channel-listing';
import { ENV_FILE_PATH } from '../datas/constants';

dotenv.config({ path: ENV_FILE_PATH })

const argv = process.argv.slice(2)

if (argv.length !== 1) {
    console.error('usage: fetch-channel-shorts <channel url | @handle | channel id>')
    process.exit(1)
}

const listing = new ChannelListing(argv[0], 'shorts')
const shorts = listing.itemReferences()

// only the first ten; later pages are never requested
for (let index = 0; index < 10; index++) {
    const reference = await shorts.at(index)
    if (!reference) break
    console.log(reference)
}
