import * as fs from 'fs'
import path from 'path'

export const fixturePath = (name: string) => path.join(__dirname, 'fixtures', name)

export const readFixture = (name: string) => fs.readFileSync(fixturePath(name), 'utf8')

// South, West, North blobs of the fixture deal
export const boardSevenBlobs = ['SKQT2H8653DA7CK32', 'SAHKJTD9654CAQ876', 'S9743H74DQJ32CJ95']
export const boardSevenEast = 'SJ865HAQ92DKT8CT4'
