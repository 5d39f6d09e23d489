/**
 * fixtures.ts: Shared schema for the compiler tests
 *
 *   person ← note.author
 *   users  ← tweet.user ← favorite.tweet
 *   users  ← favorite.user
 *   users  ← relationship.fromUser / relationship.toUser
 *   category.parent → category (self-reference, text primary key)
 *   ckm (composite key: category + key)
 *
 * `threads` is a second schema: post ← comment.post, comment.parent → comment
 */
import { defineSchema, z } from '../src/index';

export const schema = defineSchema({
    person: z.object({
        first: z.string(),
        last: z.string(),
        dob: z.string().nullable(),
    }),
    note: z.object({
        author: z.number(),
        content: z.string(),
    }),
    users: z.object({
        username: z.string(),
    }),
    tweet: z.object({
        user: z.number(),
        content: z.string(),
        timestamp: z.number().int(),
    }),
    favorite: z.object({
        user: z.number(),
        tweet: z.number(),
    }),
    relationship: z.object({
        fromUser: z.number(),
        toUser: z.number(),
    }),
    category: z.object({
        name: z.string(),
        parent: z.string().nullable(),
    }),
    ckm: z.object({
        category: z.string(),
        key: z.string(),
        value: z.number().int(),
    }),
    sample: z.object({
        counter: z.number().int(),
        value: z.number().default(1),
    }),
}, {
    relations: {
        note: { author: 'person' },
        tweet: { user: { table: 'users', backref: 'tweets' } },
        favorite: {
            user: { table: 'users', backref: 'favorites' },
            tweet: { table: 'tweet', backref: 'favorites' },
        },
        relationship: {
            fromUser: { table: 'users', column: 'from_user_id', backref: 'following' },
            toUser: { table: 'users', column: 'to_user_id', backref: 'followers' },
        },
        category: { parent: { table: 'category', backref: 'children' } },
    },
    primaryKeys: { category: 'name', ckm: ['category', 'key'] },
});

export const person = schema.table('person');
export const note = schema.table('note');
export const users = schema.table('users');
export const tweet = schema.table('tweet');
export const favorite = schema.table('favorite');
export const relationship = schema.table('relationship');
export const category = schema.table('category');
export const ckm = schema.table('ckm');
export const sample = schema.table('sample');

export const threads = defineSchema({
    post: z.object({ title: z.string() }),
    comment: z.object({ post: z.number(), parent: z.number().nullable(), body: z.string() }),
}, {
    relations: {
        comment: {
            post: { table: 'post', backref: 'comments' },
            parent: { table: 'comment', backref: 'replies' },
        },
    },
});
