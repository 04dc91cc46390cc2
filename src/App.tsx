import { useState } from 'react'
import type { FormEvent } from 'react'
import './App.css'
import type { RecipeSession } from './session'
import type { Recipe, RecipeSummary, UpdateInfo } from './types'
import type { RecipeError } from './utils/errors'
import { MAX_SERVINGS } from './utils/recipeEngine'

interface AppProps {
  session: RecipeSession
  updateNotice?: UpdateInfo | null
}

interface RecipeForm {
  name: string
  servings: string
  ingredients: string
  instructions: string
}

const emptyForm: RecipeForm = {
  name: '',
  servings: '1',
  ingredients: '',
  instructions: '',
}

const toForm = (recipe: Recipe): RecipeForm => ({
  name: recipe.name,
  servings: String(recipe.servings),
  ingredients: recipe.ingredients,
  instructions: recipe.instructions,
})

const readServings = (form: RecipeForm): number => Number(form.servings.trim() || 0)

function App({ session, updateNotice = null }: AppProps) {
  const [recipes, setRecipes] = useState<RecipeSummary[]>(() => session.listRecipes())
  const [selectedName, setSelectedName] = useState<string | null>(null)
  const [form, setForm] = useState<RecipeForm>(emptyForm)
  const [statusMessage, setStatusMessage] = useState('')
  const [errorMessage, setErrorMessage] = useState(() => session.loadError?.message ?? '')

  const refreshList = () => {
    setRecipes(session.listRecipes())
  }

  const showStatus = (message: string) => {
    setStatusMessage(message)
    setErrorMessage('')
  }

  const showError = (error: RecipeError | string) => {
    setErrorMessage(typeof error === 'string' ? error : error.message)
    setStatusMessage('')
  }

  const updateField = (field: keyof RecipeForm, value: string) => {
    setForm((current) => ({ ...current, [field]: value }))
  }

  const selectRecipe = (name: string) => {
    const result = session.getRecipe(name)
    if (!result.ok) {
      showError(result.error)
      refreshList()
      return
    }

    setSelectedName(name)
    setForm(toForm(result.value))
    setStatusMessage('')
    setErrorMessage('')
  }

  const startNewRecipe = () => {
    setSelectedName(null)
    setForm(emptyForm)
    setStatusMessage('')
    setErrorMessage('')
  }

  const handleSave = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()

    const result = session.createOrUpdateRecipe(
      {
        name: form.name,
        ingredients: form.ingredients,
        instructions: form.instructions,
        servings: readServings(form),
      },
      selectedName ?? undefined,
    )
    refreshList()

    if (!result.ok) {
      // A failed write still leaves the change in memory.
      if (result.error.kind === 'StorageWriteError') {
        setSelectedName(form.name.trim())
      }
      showError(result.error)
      return
    }

    setSelectedName(result.value.name)
    setForm(toForm(result.value))
    showStatus('Recipe saved successfully!')
  }

  const handleDelete = () => {
    if (!selectedName) {
      return
    }

    if (!window.confirm('Are you sure you want to delete this recipe?')) {
      return
    }

    const result = session.deleteRecipe(selectedName)
    refreshList()

    if (!result.ok && result.error.kind !== 'StorageWriteError') {
      showError(result.error)
      return
    }

    setSelectedName(null)
    setForm(emptyForm)
    if (result.ok) {
      showStatus(`Deleted ${result.value.name}.`)
    } else {
      showError(result.error)
    }
  }

  const handleScale = () => {
    if (!selectedName) {
      showError('Please select a recipe first!')
      return
    }

    const servings = readServings(form)
    const result = session.scaleRecipe(selectedName, servings, form.ingredients)
    if (!result.ok) {
      showError(result.error)
      return
    }

    const scaled = result.value
    setForm((current) => ({ ...current, ingredients: scaled }))
    refreshList()
    showStatus(`Scaled to ${servings} servings. Save the recipe to keep the new amounts.`)
  }

  return (
    <div className="recipe-box">
      {updateNotice && (
        <p className="banner update" role="note">
          A new version ({updateNotice.latestVersion}) is available!{' '}
          <a href={updateNotice.releaseUrl} target="_blank" rel="noreferrer">
            Download it
          </a>
        </p>
      )}
      {statusMessage && (
        <p className="banner status" role="status">
          {statusMessage}
        </p>
      )}
      {errorMessage && (
        <p className="banner error" role="alert">
          {errorMessage}
        </p>
      )}

      <section className="workspace">
        <aside className="panel recipe-list">
          <h2>Recipes</h2>
          <ul aria-label="Recipes">
            {recipes.length === 0 ? (
              <li className="empty">No recipes yet.</li>
            ) : (
              recipes.map((recipe, index) => (
                <li key={`${index}-${recipe.name}`}>
                  <button
                    type="button"
                    className={recipe.name === selectedName ? 'selected' : undefined}
                    aria-pressed={recipe.name === selectedName}
                    onClick={() => selectRecipe(recipe.name)}
                  >
                    {recipe.name}
                  </button>
                </li>
              ))
            )}
          </ul>
          <button type="button" className="primary" onClick={startNewRecipe}>
            New Recipe
          </button>
        </aside>

        <form className="panel recipe-details" onSubmit={handleSave} aria-label="Recipe details">
          <label htmlFor="recipe-name">Recipe Name</label>
          <input
            id="recipe-name"
            value={form.name}
            onChange={(event) => updateField('name', event.target.value)}
          />

          <label htmlFor="servings">Servings</label>
          <input
            id="servings"
            type="number"
            min={1}
            max={MAX_SERVINGS}
            value={form.servings}
            onChange={(event) => updateField('servings', event.target.value)}
          />

          <label htmlFor="ingredients">Ingredients</label>
          <textarea
            id="ingredients"
            value={form.ingredients}
            onChange={(event) => updateField('ingredients', event.target.value)}
            placeholder="One ingredient per line, e.g. 2 cups flour"
          />

          <label htmlFor="instructions">Instructions</label>
          <textarea
            id="instructions"
            value={form.instructions}
            onChange={(event) => updateField('instructions', event.target.value)}
          />

          <div className="action-row">
            <button type="submit" className="primary">
              Save Recipe
            </button>
            <button type="button" className="danger" onClick={handleDelete} disabled={!selectedName}>
              Delete Recipe
            </button>
            <button type="button" onClick={handleScale}>
              Scale Recipe
            </button>
          </div>
        </form>
      </section>
    </div>
  )
}

export default App
