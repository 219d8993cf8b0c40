import dotenv from 'dotenv'
dotenv.config()

export const env = {
  REDIS_URL: process.env.REDIS_URL || '',
  CHANNELS_FILE: process.env.CHANNELS_FILE || 'channels.json',
}
