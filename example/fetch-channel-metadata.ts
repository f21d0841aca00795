import dotenv from 'dotenv';
import ChannelListing from '../modules/channel-listing';
import { ENV_FILE_PATH } from '../datas/constants';

dotenv.config({ path: ENV_FILE_PATH })

const argv = process.argv.slice(2)

if (argv.length !== 1) {
    console.error('usage: fetch-channel-metadata <channel url | @handle | channel id>')
    process.exit(1)
}

const listing = new ChannelListing(argv[0])
console.log(await listing.metadata())
