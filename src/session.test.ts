import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { RecipeSession } from './session'
import type { Recipe, RecipeFields } from './types'
import { fail } from './utils/errors'
import { JsonFileStorage } from './utils/storage'
import type { RecipeStorage } from './utils/storage'

const pancakes: RecipeFields = {
  name: 'Pancakes',
  ingredients: '2 cups flour\n2 eggs\na pinch of salt',
  instructions: 'Whisk, rest, fry.',
  servings: 4,
}

describe('RecipeSession', () => {
  let tempDir: string
  let filePath: string

  const openSession = () => RecipeSession.open(new JsonFileStorage(filePath))

  const readFile = (): Recipe[] => JSON.parse(fs.readFileSync(filePath, 'utf8'))

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'recipe-box-session-'))
    filePath = path.join(tempDir, 'recipes.json')
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('creates a recipe and saves the collection', () => {
    const session = openSession()

    const result = session.createOrUpdateRecipe({ ...pancakes, name: ' Pancakes ' })

    expect(result).toEqual({ ok: true, value: pancakes })
    expect(session.listRecipes()).toEqual([{ name: 'Pancakes', servings: 4 }])
    expect(readFile()).toEqual([pancakes])
  })

  it('refuses a duplicate name and leaves the collection unchanged', () => {
    const session = openSession()
    session.createOrUpdateRecipe(pancakes)

    const result = session.createOrUpdateRecipe({ ...pancakes, servings: 12 })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('DuplicateName')
    }
    expect(session.listRecipes()).toEqual([{ name: 'Pancakes', servings: 4 }])
  })

  it.each<[string, Partial<RecipeFields>]>([
    ['name', { name: '' }],
    ['ingredients', { ingredients: ' ' }],
    ['instructions', { instructions: '' }],
    ['servings', { servings: 0 }],
    ['negative servings', { servings: -2 }],
  ])('rejects an empty %s without touching storage', (_label, override) => {
    const session = openSession()

    const result = session.createOrUpdateRecipe({ ...pancakes, ...override })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('ValidationError')
    }
    expect(session.listRecipes()).toEqual([])
    expect(fs.existsSync(filePath)).toBe(false)
  })

  it('updates an existing recipe in place', () => {
    const session = openSession()
    session.createOrUpdateRecipe(pancakes)
    const stored = session.getRecipe('Pancakes')

    const result = session.createOrUpdateRecipe(
      { ...pancakes, name: 'Buttermilk Pancakes', servings: 6 },
      'Pancakes',
    )

    expect(result.ok).toBe(true)
    expect(stored.ok && result.ok && stored.value === result.value).toBe(true)
    expect(session.listRecipes()).toEqual([{ name: 'Buttermilk Pancakes', servings: 6 }])
    expect(readFile()[0].name).toBe('Buttermilk Pancakes')
  })

  it('warns but accepts a rename onto an existing name', () => {
    const session = openSession()
    session.createOrUpdateRecipe(pancakes)
    session.createOrUpdateRecipe({ ...pancakes, name: 'Waffles' })

    const result = session.createOrUpdateRecipe(pancakes, 'Waffles')

    expect(result.ok).toBe(true)
    expect(session.listRecipes().map((recipe) => recipe.name)).toEqual(['Pancakes', 'Pancakes'])
    expect(console.warn).toHaveBeenCalledWith(
      '[session] "Waffles" was renamed to "Pancakes", which another recipe already uses',
    )
  })

  it('reports updates and deletes of unknown recipes', () => {
    const session = openSession()

    const updated = session.createOrUpdateRecipe(pancakes, 'Crepes')
    const deleted = session.deleteRecipe('Crepes')
    const fetched = session.getRecipe('Crepes')

    for (const result of [updated, deleted, fetched]) {
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.kind).toBe('NotFound')
      }
    }
  })

  it('never reloads a deleted recipe', () => {
    const session = openSession()
    session.createOrUpdateRecipe(pancakes)
    session.createOrUpdateRecipe({ ...pancakes, name: 'Waffles' })

    expect(session.deleteRecipe('Pancakes').ok).toBe(true)

    expect(openSession().listRecipes()).toEqual([{ name: 'Waffles', servings: 4 }])
  })

  it('scales the stored ingredients and records the new serving count without saving', () => {
    const session = openSession()
    session.createOrUpdateRecipe(pancakes)

    const result = session.scaleRecipe('Pancakes', 2)

    expect(result).toEqual({ ok: true, value: '1.00 cups flour\n1.00 eggs\na pinch of salt' })
    expect(session.listRecipes()).toEqual([{ name: 'Pancakes', servings: 2 }])
    expect(readFile()[0].servings).toBe(4)
  })

  it('scales the text being edited when it is passed in', () => {
    const session = openSession()
    session.createOrUpdateRecipe(pancakes)

    const result = session.scaleRecipe('Pancakes', 8, '1.5 cups milk')

    expect(result).toEqual({ ok: true, value: '3.00 cups milk' })
  })

  it('refuses to scale a recipe stored with no servings', () => {
    fs.writeFileSync(filePath, JSON.stringify([{ ...pancakes, servings: 0 }]), 'utf8')
    const session = openSession()

    const result = session.scaleRecipe('Pancakes', 4)

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('InvalidServings')
    }
    expect(session.getRecipe('Pancakes')).toMatchObject({ ok: true, value: { servings: 0 } })
  })

  it('persists scaled servings on an explicit save', () => {
    const session = openSession()
    session.createOrUpdateRecipe(pancakes)
    session.scaleRecipe('Pancakes', 6)

    expect(session.saveRecipes().ok).toBe(true)
    expect(readFile()[0].servings).toBe(6)
  })

  it('starts empty and keeps the load error when the file is corrupt', () => {
    fs.writeFileSync(filePath, 'not json', 'utf8')

    const session = openSession()

    expect(session.listRecipes()).toEqual([])
    expect(session.loadError?.kind).toBe('StorageReadError')
  })

  it('keeps the in-memory change when saving fails', () => {
    const failingStorage: RecipeStorage = {
      load: () => ({ recipes: [] }),
      save: () => fail('StorageWriteError', 'Error saving recipes: disk full'),
    }
    const session = RecipeSession.open(failingStorage)

    const result = session.createOrUpdateRecipe(pancakes)

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('StorageWriteError')
    }
    expect(session.listRecipes()).toEqual([{ name: 'Pancakes', servings: 4 }])
  })
})
