import type { ParkStore } from '../db/store.js';
import type { Cache } from '../utils/cache.js';
import { CommentService } from './commentService.js';
import { ParkService } from './parkService.js';
import { PhotoService } from './photoService.js';
import { TagService } from './tagService.js';
import { VoteLedger } from './voteLedger.js';

export interface Services {
  parks: ParkService;
  votes: VoteLedger;
  photos: PhotoService;
  comments: CommentService;
  tags: TagService;
}

export interface ServiceOptions {
  tagsTtl?: number;
}

export function createServices(store: ParkStore, cache: Cache, options: ServiceOptions = {}): Services {
  return {
    parks: new ParkService(store, cache),
    votes: new VoteLedger(store),
    photos: new PhotoService(store),
    comments: new CommentService(store),
    tags: new TagService(store, cache, options.tagsTtl),
  };
}
