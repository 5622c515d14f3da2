/**
 * Test models
 *
 * Hand-written records the way generated accessors look:
 * - User: auto-increment key, JSON and array columns, posts (one-to-many) and profile (one-to-one)
 * - Post: maps its user_id foreign key as a field, author (forward one-to-one)
 * - Profile: inline location columns, foreign key held as a virtual column
 * - Category: caller-assigned string key
 */

import {
    FieldKind,
    RelationshipDirection,
    RelationshipKind,
    defineModel,
    type ModelDescriptor,
} from '@src/lib/schema/index.js';
import { Schema } from '@src/lib/schema/schema.js';
import {
    ModelRecord,
    expectBoolean,
    expectJson,
    expectNumber,
    expectString,
    expectStringArray,
    manyOf,
    oneOf,
    optionalNumber,
    optionalString,
    type JsonValue,
    type RelationshipValue,
} from '@src/lib/model-record.js';
import { OrmErrors } from '@src/lib/errors/orm-error.js';

export class UserRecord extends ModelRecord {
    id: number | null = null;
    email = '';
    name: string | null = null;
    settings: JsonValue = null;
    tags: string[] = [];

    posts: PostRecord[] | undefined = undefined;
    profile: ProfileRecord | null | undefined = undefined;

    value(column: string): unknown {
        switch (column) {
            case 'id': return this.id;
            case 'email': return this.email;
            case 'name': return this.name;
            case 'settings': return this.settings;
            case 'tags': return this.tags;
            default: throw OrmErrors.unknownColumn('User', column);
        }
    }

    setValue(column: string, value: unknown): void {
        switch (column) {
            case 'id': this.id = optionalNumber(value, column); break;
            case 'email': this.email = expectString(value, column); break;
            case 'name': this.name = optionalString(value, column); break;
            case 'settings': this.settings = expectJson(value, column); break;
            case 'tags': this.tags = value === null ? [] : expectStringArray(value, column); break;
            default: throw OrmErrors.unknownColumn('User', column);
        }
    }

    relationship(name: string): RelationshipValue | undefined {
        switch (name) {
            case 'posts': return this.posts;
            case 'profile': return this.profile;
            default: return undefined;
        }
    }

    setRelationship(name: string, value: RelationshipValue): void {
        switch (name) {
            case 'posts': this.posts = manyOf(value, PostRecord, name); break;
            case 'profile': this.profile = oneOf(value, ProfileRecord, name); break;
        }
    }
}

export class PostRecord extends ModelRecord {
    id: number | null = null;
    title = '';
    published = false;
    views = 0;
    userId: number | null = null;

    author: UserRecord | null | undefined = undefined;

    value(column: string): unknown {
        switch (column) {
            case 'id': return this.id;
            case 'title': return this.title;
            case 'published': return this.published;
            case 'views': return this.views;
            case 'user_id': return this.userId;
            default: throw OrmErrors.unknownColumn('Post', column);
        }
    }

    setValue(column: string, value: unknown): void {
        switch (column) {
            case 'id': this.id = optionalNumber(value, column); break;
            case 'title': this.title = expectString(value, column); break;
            case 'published': this.published = expectBoolean(value, column); break;
            case 'views': this.views = expectNumber(value, column); break;
            case 'user_id': this.userId = optionalNumber(value, column); break;
            default: throw OrmErrors.unknownColumn('Post', column);
        }
    }

    relationship(name: string): RelationshipValue | undefined {
        return name === 'author' ? this.author : undefined;
    }

    setRelationship(name: string, value: RelationshipValue): void {
        if (name === 'author') {
            this.author = oneOf(value, UserRecord, name);
        }
    }
}

export class ProfileRecord extends ModelRecord {
    id: number | null = null;
    bio: string | null = null;
    location: { city: string | null; country: string | null } = { city: null, country: null };

    value(column: string): unknown {
        switch (column) {
            case 'id': return this.id;
            case 'bio': return this.bio;
            case 'location_city': return this.location.city;
            case 'location_country': return this.location.country;
            default: throw OrmErrors.unknownColumn('Profile', column);
        }
    }

    setValue(column: string, value: unknown): void {
        switch (column) {
            case 'id': this.id = optionalNumber(value, column); break;
            case 'bio': this.bio = optionalString(value, column); break;
            case 'location_city': this.location.city = optionalString(value, column); break;
            case 'location_country': this.location.country = optionalString(value, column); break;
            default: throw OrmErrors.unknownColumn('Profile', column);
        }
    }

    relationship(_name: string): RelationshipValue | undefined {
        return undefined;
    }

    setRelationship(_name: string, _value: RelationshipValue): void {}
}

export class CategoryRecord extends ModelRecord {
    code = '';
    label = '';

    value(column: string): unknown {
        switch (column) {
            case 'code': return this.code;
            case 'label': return this.label;
            default: throw OrmErrors.unknownColumn('Category', column);
        }
    }

    setValue(column: string, value: unknown): void {
        switch (column) {
            case 'code': this.code = expectString(value, column); break;
            case 'label': this.label = expectString(value, column); break;
            default: throw OrmErrors.unknownColumn('Category', column);
        }
    }

    relationship(_name: string): RelationshipValue | undefined {
        return undefined;
    }

    setRelationship(_name: string, _value: RelationshipValue): void {}
}

export const User: ModelDescriptor<UserRecord> = defineModel({
    name: 'User',
    table: 'users',
    create: () => new UserRecord(),
    primaryKey: { field: 'id', autoIncrement: true },
    fields: [
        'id',
        { name: 'email', nullable: false },
        'name',
        { name: 'settings', kind: FieldKind.Json },
        { name: 'tags', kind: FieldKind.Array },
    ],
    relationships: [
        { name: 'posts', kind: RelationshipKind.OneToMany, target: () => Post },
        { name: 'profile', kind: RelationshipKind.OneToOne, target: () => Profile },
    ],
});

export const Post: ModelDescriptor<PostRecord> = defineModel({
    name: 'Post',
    table: 'posts',
    create: () => new PostRecord(),
    primaryKey: { field: 'id', autoIncrement: true },
    fields: ['id', 'title', 'published', 'views', { name: 'userId', column: 'user_id' }],
    relationships: [
        {
            name: 'author',
            kind: RelationshipKind.OneToOne,
            direction: RelationshipDirection.Forward,
            target: () => User,
        },
    ],
});

export const Profile: ModelDescriptor<ProfileRecord> = defineModel({
    name: 'Profile',
    table: 'profiles',
    create: () => new ProfileRecord(),
    primaryKey: { field: 'id', autoIncrement: true },
    fields: [
        'id',
        'bio',
        { name: 'location', kind: FieldKind.Inline, column: 'location_', fields: ['city', 'country'] },
    ],
});

export const Category: ModelDescriptor<CategoryRecord> = defineModel({
    name: 'Category',
    table: 'categories',
    create: () => new CategoryRecord(),
    primaryKey: { field: 'code' },
    fields: ['code', 'label'],
});

export const schema = new Schema([User, Post, Profile, Category]);

export function makeUser(email: string, name: string | null = null): UserRecord {
    const user = new UserRecord();
    user.email = email;
    user.name = name;
    return user;
}

export function makePost(title: string, views = 0, published = false): PostRecord {
    const post = new PostRecord();
    post.title = title;
    post.views = views;
    post.published = published;
    return post;
}
