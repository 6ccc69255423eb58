import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  DEFAULT_TITLE,
  extractIngredients,
  extractInstructions,
  extractMacros,
  extractTitle,
  hasMeasuredUnit,
  isIngredientLine,
  mentionsUnit,
} from "../src/pipeline/extract";

describe("extract", () => {
  describe("extractTitle", () => {
    it("takes the letter run after a recipe label", () => {
      assert.equal(extractTitle("Recipe: Lemon Bars\n1 cup sugar"), "Lemon Bars");
      assert.equal(extractTitle("Recipe - Tomato Soup, Chunky\nMethod"), "Tomato Soup, Chunky");
    });

    it("uses the leading run of a block left over from a delimiter", () => {
      assert.equal(extractTitle(" A\ntext1"), "A");
    });

    it("falls back to the default title when the block starts with digits", () => {
      assert.equal(extractTitle("2024 edition\nPancakes"), DEFAULT_TITLE);
      assert.equal(extractTitle(""), "Untitled Recipe");
    });
  });

  describe("ingredients", () => {
    it("requires a whole unit word after the quantity for the measured rule", () => {
      assert.equal(hasMeasuredUnit("1.5 cup sugar"), true);
      assert.equal(hasMeasuredUnit("- 200 g rice"), true);
      assert.equal(hasMeasuredUnit("• 3 tbsp olive oil"), true);
      assert.equal(hasMeasuredUnit("2 cupcakes"), false);
      assert.equal(hasMeasuredUnit("2 grams butter"), false);
      assert.equal(hasMeasuredUnit("2 cups flour"), false);
    });

    it("accepts any unit substring after a leading count", () => {
      assert.equal(mentionsUnit("3 large eggs with 1 tbsp water"), true);
      assert.equal(mentionsUnit("2 cups flour"), true);
      assert.equal(mentionsUnit("2 cupcakes"), true);
      assert.equal(mentionsUnit("10 minutes"), false);
      assert.equal(mentionsUnit("tbsp honey"), false);
    });

    it("classifies a line when either rule holds", () => {
      assert.equal(isIngredientLine("2 cups flour"), true);
      assert.equal(isIngredientLine("3 large eggs with 1 tbsp water"), true);
      assert.equal(isIngredientLine("Serves 4 people"), false);
      assert.equal(isIngredientLine(""), false);
    });

    it("keeps qualifying lines trimmed and in order", () => {
      const text = [
        "Pancakes",
        "Ingredients",
        "- 2 cups flour",
        "  1 tsp salt  ",
        "",
        "3 eggs",
        "Mix well",
      ].join("\n");

      assert.deepEqual(extractIngredients(text), ["- 2 cups flour", "1 tsp salt", "3 eggs"]);
    });
  });

  describe("extractInstructions", () => {
    it("captures after the header and stops at a macros line", () => {
      const text = "Instructions\nStep one here\nMacros: 200 calories";

      assert.deepEqual(extractInstructions(text), ["Step one here"]);
    });

    it("skips short, empty and tag lines while capturing", () => {
      const text = [
        "Directions:",
        "",
        "Mix.",
        "Tag us on social media please",
        "Whisk the eggs well",
        "Stir it",
        "Bake for twenty minutes",
        "Nutrition facts",
        "Serve it warm tonight",
      ].join("\n");

      assert.deepEqual(extractInstructions(text), [
        "Whisk the eggs well",
        "Bake for twenty minutes",
      ]);
    });

    it("returns nothing without a header", () => {
      assert.deepEqual(extractInstructions("Whisk the eggs well\nBake for twenty minutes"), []);
    });
  });

  describe("extractMacros", () => {
    it("parses each macro name with the number after it", () => {
      assert.deepEqual(extractMacros("Calories: 250, Protein 12g"), {
        calories: 250,
        protein: 12,
      });
    });

    it("keeps the last value for a repeated name", () => {
      assert.deepEqual(extractMacros("fat 5 ... fat 8"), { fat: 8 });
      assert.deepEqual(extractMacros("Total Fat 10g (Saturated Fat 2g)"), { fat: 2 });
    });

    it("keeps first-appearance key order and decimal values", () => {
      const macros = extractMacros("Carbohydrates: 30.5g\nSodium 410mg\nCarbohydrates 31");

      assert.deepEqual(Object.keys(macros), ["carbohydrates", "sodium"]);
      assert.equal(macros.carbohydrates, 31);
      assert.equal(macros.sodium, 410);
      assert.deepEqual(extractMacros("Carbohydrates: 30.5g"), { carbohydrates: 30.5 });
    });

    it("returns an empty mapping when nothing matches", () => {
      assert.deepEqual(extractMacros("2 cups flour"), {});
    });
  });
});
